import { describe, it, expect } from 'vitest';
import {
  KEY_PREFIX_LENGTH,
  formatAccount,
  formatCognitiveKeys,
  formatDeployments,
  formatFailure,
  formatResourceGroups,
  formatResources,
  formatStorageKeys,
  formatSubscriptions,
  formatUnexpected,
  redactKey,
} from './azure-format.js';

const RULE = '-'.repeat(60);

describe('redactKey', () => {
  it('keeps only the first 20 characters followed by an ellipsis', () => {
    const secret = 'abcdefghijklmnopqrstuvwxyz0123456789';
    expect(redactKey(secret)).toBe('abcdefghijklmnopqrst...');
  });

  it('never shows more than the prefix of a long secret', () => {
    const secret = 'k'.repeat(500);
    const shown = redactKey(secret);
    expect(shown).toBe('k'.repeat(KEY_PREFIX_LENGTH) + '...');
  });

  it('marks short secrets as truncated too', () => {
    expect(redactKey('short')).toBe('short...');
  });

  it('renders a missing key as N/A', () => {
    expect(redactKey(undefined)).toBe('N/A');
    expect(redactKey(null)).toBe('N/A');
    expect(redactKey('')).toBe('N/A');
  });
});

describe('formatSubscriptions', () => {
  it('marks enabled and default subscriptions', () => {
    const lines = formatSubscriptions([
      { id: 'sub-1', name: 'Production', state: 'Enabled', isDefault: true },
      { id: 'sub-2', name: 'Sandbox', state: 'Disabled' },
    ]);
    expect(lines).toEqual([
      '',
      '📋 Azure Subscriptions:',
      RULE,
      '  ✓ Production (DEFAULT)',
      '    ID: sub-1',
      '  ✗ Sandbox',
      '    ID: sub-2',
    ]);
  });
});

describe('formatAccount', () => {
  it('falls back to N/A when the user is missing', () => {
    expect(formatAccount({ id: 'sub-1', name: 'Production', tenantId: 'tenant-1' })).toEqual([
      '',
      '👤 Current Azure Account:',
      RULE,
      '  Subscription: Production',
      '  ID: sub-1',
      '  Tenant: tenant-1',
      '  User: N/A',
    ]);
  });

  it('shows the signed-in user', () => {
    const lines = formatAccount({
      id: 'sub-1',
      name: 'Production',
      tenantId: 'tenant-1',
      user: { name: 'dev@example.com' },
    });
    expect(lines[6]).toBe('  User: dev@example.com');
  });
});

describe('formatResourceGroups / formatResources', () => {
  it('lists groups with their location', () => {
    expect(formatResourceGroups([{ name: 'rg-app', location: 'eastus' }]).slice(1)).toEqual([
      '📁 Resource Groups:',
      RULE,
      '  • rg-app (eastus)',
    ]);
  });

  it('names the group in the resources header when filtered', () => {
    expect(formatResources([], 'rg-app')[1]).toBe('🔧 Resources in rg-app:');
    expect(formatResources([])[1]).toBe('🔧 Resources:');
  });

  it('prints type and location under each resource', () => {
    const lines = formatResources([
      { name: 'store1', type: 'Microsoft.Storage/storageAccounts', location: 'westeurope' },
    ]);
    expect(lines.slice(3)).toEqual([
      '  • store1',
      '    Type: Microsoft.Storage/storageAccounts',
      '    Location: westeurope',
      '',
    ]);
  });
});

describe('key reports', () => {
  it('redacts cognitive keys', () => {
    const lines = formatCognitiveKeys('my-ai', {
      key1: '0123456789abcdef0123456789abcdef',
      key2: null,
    });
    expect(lines).toEqual([
      '',
      '🔑 API Keys for my-ai:',
      RULE,
      '  Key1: 0123456789abcdef0123...',
      '  Key2: N/A',
    ]);
  });

  it('redacts every storage key', () => {
    const lines = formatStorageKeys('store1', [
      { keyName: 'key1', value: 'test-secret-value-number-one' },
      { keyName: 'key2', value: 'test-secret-value-number-two' },
    ]);
    expect(lines.slice(3)).toEqual(['  key1: test-secret-value-nu...', '  key2: test-secret-value-nu...']);
  });
});

describe('formatDeployments', () => {
  it('shows the model name or N/A', () => {
    const lines = formatDeployments('my-openai', [
      { name: 'chat', properties: { model: { name: 'gpt-4' } } },
      { name: 'legacy' },
    ]);
    expect(lines.slice(1)).toEqual([
      '🤖 Deployments for my-openai:',
      RULE,
      '  • chat',
      '    Model: gpt-4',
      '  • legacy',
      '    Model: N/A',
    ]);
  });
});

describe('failure lines', () => {
  it('prefixes failures with a marker', () => {
    expect(formatFailure('ERROR: denied\n')).toBe('❌ Error: ERROR: denied');
    expect(formatFailure('bad code', 'Login failed')).toBe('❌ Login failed: bad code');
  });

  it('includes the decode error for unexpected output', () => {
    expect(formatUnexpected('raw\n', 'Output is not valid JSON: x')).toEqual([
      '⚠️  Unexpected az output (Output is not valid JSON: x)',
      'raw',
    ]);
    expect(formatUnexpected('raw')).toEqual(['⚠️  Unexpected az output', 'raw']);
  });
});
