import { readFileSync } from 'node:fs';
import { describe, it, expect } from 'vitest';

const manifest: unknown = JSON.parse(readFileSync(new URL('../../package.json', import.meta.url), 'utf8'));

function dependenciesOf(value: unknown): Record<string, unknown> {
  if (typeof value !== 'object' || value === null || !('dependencies' in value)) return {};
  const { dependencies } = value;
  return typeof dependencies === 'object' && dependencies !== null ? { ...dependencies } : {};
}

describe('api package manifest', () => {
  it('installs the pretty log transport the server loads outside production', () => {
    expect(dependenciesOf(manifest)).toHaveProperty('pino-pretty');
  });
});
