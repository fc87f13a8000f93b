/**
 * Azure operations behind azure-tool.
 *
 * Each operation runs one or two az commands, prints a report to stdout and
 * returns the last {@link AzOutcome} so the module can be driven from code
 * as well as from the CLI.
 */

import type { z } from 'zod';
import { runAz, runAzJson, type AzOutcome } from './az.js';
import {
  formatAccount,
  formatCognitiveKeys,
  formatDeployments,
  formatFailure,
  formatResourceGroups,
  formatResources,
  formatStorageKeys,
  formatSubscriptions,
  formatUnexpected,
} from './azure-format.js';
import {
  AccountSchema,
  AnyJsonSchema,
  CognitiveKeysSchema,
  DeploymentListSchema,
  ResourceGroupListSchema,
  ResourceListSchema,
  StorageKeyListSchema,
  SubscriptionListSchema,
  type Account,
  type CognitiveKeys,
  type Deployment,
  type Resource,
  type ResourceGroup,
  type StorageKey,
  type Subscription,
} from './azure-schemas.js';
import { getConfig } from './config.js';

export const DEFAULT_COGNITIVE_KIND = 'CognitiveServices';
export const DEFAULT_MODEL_NAME = 'gpt-4';
export const DEFAULT_MODEL_VERSION = 'turbo-2024-04-09';

function print(lines: string[]): void {
  for (const line of lines) console.log(line);
}

/** Prints the report for a structured outcome, or the failure / raw text. */
function report<T>(outcome: AzOutcome<T>, render: (data: T) => string[]): AzOutcome<T> {
  switch (outcome.kind) {
    case 'structured':
      print(render(outcome.data));
      break;
    case 'text':
      print(formatUnexpected(outcome.text, outcome.decodeError));
      break;
    case 'failed':
      print([formatFailure(outcome.error)]);
      break;
  }
  return outcome;
}

async function runJson<S extends z.ZodTypeAny>(
  args: string[],
  schema: S,
  render: (data: z.infer<S>) => string[],
): Promise<AzOutcome<z.infer<S>>> {
  return report(await runAzJson(args, schema), render);
}

// ---------- Account ----------

/** Interactive `az login`; opens a browser on the machine running the tool. */
export async function login(): Promise<AzOutcome<Subscription[]>> {
  console.log('Opening browser for Azure login...');
  const result = await runAz(['login']);
  if (result.kind === 'failed') {
    print([formatFailure(result.error, 'Login failed')]);
    return result;
  }
  console.log('✅ Login successful!');
  return listSubscriptions();
}

export function getAccountInfo(): Promise<AzOutcome<Account>> {
  return runJson(['account', 'show'], AccountSchema, formatAccount);
}

export function listSubscriptions(): Promise<AzOutcome<Subscription[]>> {
  return runJson(['account', 'list'], SubscriptionListSchema, formatSubscriptions);
}

export async function setSubscription(subscriptionId: string): Promise<AzOutcome<never>> {
  const result = await runAz(['account', 'set', '--subscription', subscriptionId]);
  if (result.kind === 'failed') {
    print([formatFailure(result.error)]);
  } else {
    console.log(`✅ Active subscription set to: ${subscriptionId}`);
  }
  return result;
}

// ---------- Resources ----------

export function listResourceGroups(): Promise<AzOutcome<ResourceGroup[]>> {
  return runJson(['group', 'list'], ResourceGroupListSchema, formatResourceGroups);
}

export function listResources(resourceGroup?: string): Promise<AzOutcome<Resource[]>> {
  const args = ['resource', 'list'];
  if (resourceGroup) {
    args.push('--resource-group', resourceGroup);
  }
  return runJson(args, ResourceListSchema, (resources) => formatResources(resources, resourceGroup));
}

// ---------- API keys ----------

export function getCognitiveKeys(
  resourceName: string,
  resourceGroup: string,
): Promise<AzOutcome<CognitiveKeys>> {
  return runJson(
    ['cognitiveservices', 'account', 'keys', 'list', '--name', resourceName, '--resource-group', resourceGroup],
    CognitiveKeysSchema,
    (keys) => formatCognitiveKeys(resourceName, keys),
  );
}

export function getStorageKeys(
  accountName: string,
  resourceGroup: string,
): Promise<AzOutcome<StorageKey[]>> {
  return runJson(
    ['storage', 'account', 'keys', 'list', '--account-name', accountName, '--resource-group', resourceGroup],
    StorageKeyListSchema,
    (keys) => formatStorageKeys(accountName, keys),
  );
}

/** Azure OpenAI resources are Cognitive Services accounts. */
export function getOpenAIKeys(
  resourceName: string,
  resourceGroup: string,
): Promise<AzOutcome<CognitiveKeys>> {
  return getCognitiveKeys(resourceName, resourceGroup);
}

type KeyFetcher = (
  name: string,
  resourceGroup: string,
) => Promise<AzOutcome<CognitiveKeys> | AzOutcome<StorageKey[]>>;

export const KEY_FETCHERS: ReadonlyMap<string, KeyFetcher> = new Map<string, KeyFetcher>([
  ['cognitive', getCognitiveKeys],
  ['openai', getOpenAIKeys],
  ['storage', getStorageKeys],
]);

export async function getKeys(
  resourceType: string,
  resourceName: string,
  resourceGroup: string,
): Promise<AzOutcome<CognitiveKeys> | AzOutcome<StorageKey[]>> {
  const fetcher = KEY_FETCHERS.get(resourceType.toLowerCase());
  if (!fetcher) {
    console.log(`❌ Unknown resource type: ${resourceType}`);
    console.log(`   Supported types: ${[...KEY_FETCHERS.keys()].join(', ')}`);
    return { kind: 'failed', error: `Unknown resource type: ${resourceType}` };
  }
  return fetcher(resourceName, resourceGroup);
}

// ---------- Create ----------

/** Runs a create command; prints `success` when az exits cleanly. */
async function runCreate(args: string[], success: string): Promise<AzOutcome<unknown>> {
  const result = await runAzJson(args, AnyJsonSchema);
  if (result.kind === 'failed') {
    print([formatFailure(result.error)]);
  } else {
    console.log(success);
  }
  return result;
}

export function createResourceGroup(
  name: string,
  location: string = getConfig().azDefaultLocation,
): Promise<AzOutcome<unknown>> {
  return runCreate(
    ['group', 'create', '--name', name, '--location', location],
    `✅ Resource group '${name}' created in ${location}`,
  );
}

export interface CreateCognitiveOptions {
  kind?: string;
  sku?: string;
  location?: string;
}

/**
 * Creates a Cognitive Services account and prints its keys.
 *
 * Kinds include CognitiveServices, OpenAI, FormRecognizer, ComputerVision,
 * TextAnalytics and SpeechServices.
 */
export async function createCognitiveService(
  name: string,
  resourceGroup: string,
  options: CreateCognitiveOptions = {},
): Promise<AzOutcome<unknown>> {
  const kind = options.kind ?? DEFAULT_COGNITIVE_KIND;
  const created = await runCreate(
    [
      'cognitiveservices', 'account', 'create',
      '--name', name,
      '--resource-group', resourceGroup,
      '--kind', kind,
      '--sku', options.sku ?? 'S0',
      '--location', options.location ?? getConfig().azDefaultLocation,
      '--yes',
    ],
    `✅ Cognitive Service '${name}' (${kind}) created`,
  );
  if (created.kind === 'failed') return created;
  return getCognitiveKeys(name, resourceGroup);
}

export async function createStorageAccount(
  name: string,
  resourceGroup: string,
  options: { sku?: string; location?: string } = {},
): Promise<AzOutcome<unknown>> {
  const created = await runCreate(
    [
      'storage', 'account', 'create',
      '--name', name,
      '--resource-group', resourceGroup,
      '--sku', options.sku ?? 'Standard_LRS',
      '--location', options.location ?? getConfig().azDefaultLocation,
    ],
    `✅ Storage account '${name}' created`,
  );
  if (created.kind === 'failed') return created;
  return getStorageKeys(name, resourceGroup);
}

export function createOpenAIService(
  name: string,
  resourceGroup: string,
  location?: string,
): Promise<AzOutcome<unknown>> {
  return createCognitiveService(name, resourceGroup, { kind: 'OpenAI', location });
}

// ---------- Deployments ----------

export function listOpenAIDeployments(
  resourceName: string,
  resourceGroup: string,
): Promise<AzOutcome<Deployment[]>> {
  return runJson(
    ['cognitiveservices', 'account', 'deployment', 'list', '--name', resourceName, '--resource-group', resourceGroup],
    DeploymentListSchema,
    (deployments) => formatDeployments(resourceName, deployments),
  );
}

export function createOpenAIDeployment(
  resourceName: string,
  resourceGroup: string,
  deploymentName: string,
  modelName: string = DEFAULT_MODEL_NAME,
  modelVersion: string = DEFAULT_MODEL_VERSION,
): Promise<AzOutcome<unknown>> {
  return runCreate(
    [
      'cognitiveservices', 'account', 'deployment', 'create',
      '--name', resourceName,
      '--resource-group', resourceGroup,
      '--deployment-name', deploymentName,
      '--model-name', modelName,
      '--model-version', modelVersion,
      '--model-format', 'OpenAI',
    ],
    `✅ Deployment '${deploymentName}' (${modelName}) created`,
  );
}
