/**
 * Text reports for azure-tool. Each function returns the lines to print so
 * the reports can be checked without a console.
 */

import type {
  Account,
  CognitiveKeys,
  Deployment,
  Resource,
  ResourceGroup,
  StorageKey,
  Subscription,
} from './azure-schemas.js';

export const KEY_PREFIX_LENGTH = 20;
const RULE = '-'.repeat(60);

/** Shows at most {@link KEY_PREFIX_LENGTH} characters of a secret. */
export function redactKey(secret: string | null | undefined): string {
  if (!secret) return 'N/A';
  return `${secret.slice(0, KEY_PREFIX_LENGTH)}...`;
}

function section(title: string): string[] {
  return ['', title, RULE];
}

export function formatSubscriptions(subs: Subscription[]): string[] {
  const lines = section('📋 Azure Subscriptions:');
  for (const sub of subs) {
    const status = sub.state === 'Enabled' ? '✓' : '✗';
    const marker = sub.isDefault ? ' (DEFAULT)' : '';
    lines.push(`  ${status} ${sub.name}${marker}`, `    ID: ${sub.id}`);
  }
  return lines;
}

export function formatAccount(account: Account): string[] {
  return [
    ...section('👤 Current Azure Account:'),
    `  Subscription: ${account.name}`,
    `  ID: ${account.id}`,
    `  Tenant: ${account.tenantId}`,
    `  User: ${account.user?.name ?? 'N/A'}`,
  ];
}

export function formatResourceGroups(groups: ResourceGroup[]): string[] {
  const lines = section('📁 Resource Groups:');
  for (const group of groups) {
    lines.push(`  • ${group.name} (${group.location})`);
  }
  return lines;
}

export function formatResources(resources: Resource[], resourceGroup?: string): string[] {
  const lines = section(`🔧 Resources${resourceGroup ? ` in ${resourceGroup}` : ''}:`);
  for (const res of resources) {
    lines.push(`  • ${res.name}`, `    Type: ${res.type}`, `    Location: ${res.location}`, '');
  }
  return lines;
}

export function formatCognitiveKeys(resourceName: string, keys: CognitiveKeys): string[] {
  return [
    ...section(`🔑 API Keys for ${resourceName}:`),
    `  Key1: ${redactKey(keys.key1)}`,
    `  Key2: ${redactKey(keys.key2)}`,
  ];
}

export function formatStorageKeys(accountName: string, keys: StorageKey[]): string[] {
  const lines = section(`🔑 Storage Keys for ${accountName}:`);
  for (const key of keys) {
    lines.push(`  ${key.keyName}: ${redactKey(key.value)}`);
  }
  return lines;
}

export function formatDeployments(resourceName: string, deployments: Deployment[]): string[] {
  const lines = section(`🤖 Deployments for ${resourceName}:`);
  for (const dep of deployments) {
    lines.push(`  • ${dep.name}`, `    Model: ${dep.properties?.model?.name ?? 'N/A'}`);
  }
  return lines;
}

export function formatFailure(error: string, prefix = 'Error'): string {
  return `❌ ${prefix}: ${error.trim()}`;
}

export function formatUnexpected(text: string, decodeError?: string): string[] {
  const reason = decodeError ? ` (${decodeError})` : '';
  return [`⚠️  Unexpected az output${reason}`, text.trim()];
}
