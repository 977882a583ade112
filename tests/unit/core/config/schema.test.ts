import { describe, it, expect } from 'vitest';
import { ConfigSchema, FragmentSettingsSchema } from '../../../../src/core/config/schema.js';

describe('ConfigSchema', () => {
  it('should treat null sections as missing', () => {
    const config = ConfigSchema.parse({ logging: null, hooks: null });

    expect(config.logging.level).toBe('info');
    expect(config.hooks.enabled).toBe(true);
  });

  it('should accept every log level', () => {
    for (const level of ['debug', 'info', 'warn', 'error', 'silent']) {
      expect(ConfigSchema.safeParse({ logging: { level } }).success).toBe(true);
    }
  });

  it('should reject an empty fragment suffix', () => {
    expect(FragmentSettingsSchema.safeParse({ suffix: '' }).success).toBe(false);
  });
});
