import type { CommandSpec, CommandTable } from './dispatch.js';
import {
  createCognitiveService,
  createOpenAIDeployment,
  createOpenAIService,
  createResourceGroup,
  createStorageAccount,
  getAccountInfo,
  getKeys,
  listOpenAIDeployments,
  listResourceGroups,
  listResources,
  listSubscriptions,
  login,
  setSubscription,
} from './azure.js';

export const AZURE_COMMANDS: CommandTable = new Map<string, CommandSpec>([
  ['login', { run: () => login() }],
  ['account', { run: () => getAccountInfo() }],
  ['list_subscriptions', { run: () => listSubscriptions() }],
  ['set_subscription', { args: '<subscription_id>', minArgs: 1, run: ([id]) => setSubscription(id) }],
  ['list_groups', { run: () => listResourceGroups() }],
  ['list_resources', { args: '[resource_group]', run: ([group]) => listResources(group) }],
  [
    'get_keys',
    {
      args: '<type> <name> <resource_group>',
      minArgs: 3,
      run: ([type, name, group]) => getKeys(type, name, group),
    },
  ],
  [
    'create_resource_group',
    {
      args: '<name> [location]',
      minArgs: 1,
      run: ([name, location]) => createResourceGroup(name, location),
    },
  ],
  [
    'create_cognitive',
    {
      args: '<name> <resource_group> [kind]',
      minArgs: 2,
      run: ([name, group, kind]) => createCognitiveService(name, group, { kind }),
    },
  ],
  [
    'create_storage',
    { args: '<name> <resource_group>', minArgs: 2, run: ([name, group]) => createStorageAccount(name, group) },
  ],
  [
    'create_openai',
    { args: '<name> <resource_group>', minArgs: 2, run: ([name, group]) => createOpenAIService(name, group) },
  ],
  [
    'list_deployments',
    {
      args: '<resource_name> <resource_group>',
      minArgs: 2,
      run: ([name, group]) => listOpenAIDeployments(name, group),
    },
  ],
  [
    'create_deployment',
    {
      args: '<resource_name> <resource_group> <deployment_name> [model] [version]',
      minArgs: 3,
      run: ([name, group, deployment, model, version]) =>
        createOpenAIDeployment(name, group, deployment, model, version),
    },
  ],
]);

export const AZURE_HELP: string[] = [
  'Azure automation toolkit: API keys, resource creation and management.',
  '',
  'Requirements:',
  '  - Azure CLI installed (az --version)',
  '  - Logged in (az login, or `azure-tool login`)',
  '',
  'Usage:',
  ...[...AZURE_COMMANDS].map(([name, spec]) => `  azure-tool ${name}${spec.args ? ` ${spec.args}` : ''}`),
];
