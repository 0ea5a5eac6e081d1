import {
  ConvoTrackModule,
  MockStorageAdapter,
  defaultConvoTrackConfig,
  mergeConfig,
  validateEnvironment,
} from '../../src';

describe('Configuration', () => {
  describe('validateEnvironment', () => {
    it('should apply defaults for unset variables', () => {
      const env = validateEnvironment({});

      expect(env.PORT).toBe(5000);
      expect(env.STORAGE_TYPE).toBe('typeorm');
      expect(env.DB_PATH).toBe('db_data/whatsapp_data.db');
      expect(env.DB_BUSY_TIMEOUT_MS).toBe(5000);
      expect(env.WEBHOOK_TIMEOUT_MS).toBe(10000);
      expect(env.DEBUG).toBe(false);
      expect(env.WHATSAPP_APP_SECRET).toBeUndefined();
    });

    it('should convert string values', () => {
      const env = validateEnvironment({
        PORT: '8080',
        DEBUG: 'true',
        DB_LOGGING: 'false',
        WHATSAPP_APP_SECRET: 'test-secret',
      });

      expect(env.PORT).toBe(8080);
      expect(env.DEBUG).toBe(true);
      expect(env.DB_LOGGING).toBe(false);
      expect(env.WHATSAPP_APP_SECRET).toBe('test-secret');
    });

    it('should read "false" flags as false', () => {
      const env = validateEnvironment({ DEBUG: 'false', DB_LOGGING: 'FALSE' });

      expect(env.DEBUG).toBe(false);
      expect(env.DB_LOGGING).toBe(false);
    });

    it('should read flags case-insensitively and accept booleans', () => {
      expect(validateEnvironment({ DEBUG: 'True' }).DEBUG).toBe(true);
      expect(validateEnvironment({ DEBUG: true }).DEBUG).toBe(true);
      expect(validateEnvironment({ DB_LOGGING: false }).DB_LOGGING).toBe(false);
    });

    it('should reject invalid values', () => {
      expect(() => validateEnvironment({ STORAGE_TYPE: 'postgres' })).toThrow(
        /Invalid environment/,
      );
      expect(() => validateEnvironment({ PORT: 'eighty' })).toThrow(
        /Invalid environment/,
      );
    });
  });

  describe('mergeConfig', () => {
    it('should fill the webhook timeout and debug flag', () => {
      const config = mergeConfig({ storage: { type: 'memory' }, whatsapp: {} });

      expect(config.webhooks).toEqual(defaultConvoTrackConfig.webhooks);
      expect(config.debug).toBe(false);
    });

    it('should keep explicit values', () => {
      const config = mergeConfig({
        storage: { type: 'memory' },
        whatsapp: {},
        webhooks: { timeoutMs: 250 },
        debug: true,
      });

      expect(config.webhooks?.timeoutMs).toBe(250);
      expect(config.debug).toBe(true);
    });
  });

  describe('ConvoTrackModule.createStore', () => {
    it('should build an initialized in-memory store', async () => {
      const store = await ConvoTrackModule.createStore({
        storage: { type: 'memory' },
        whatsapp: {},
      });

      expect(store).toBeInstanceOf(MockStorageAdapter);
      expect(await store.isHealthy()).toBe(true);
      await store.close();
    });

    it('should initialize a custom store', async () => {
      const custom = new MockStorageAdapter();

      const store = await ConvoTrackModule.createStore({
        storage: { type: 'custom', store: custom },
        whatsapp: {},
      });

      expect(store).toBe(custom);
      expect(await custom.readCounters()).toEqual({
        new_conversation_count: 0,
        open_conversation_count: 0,
        closed_conversation_count: 0,
      });
    });

    it('should reject a custom store type without a store', async () => {
      await expect(
        ConvoTrackModule.createStore({ storage: { type: 'custom' }, whatsapp: {} }),
      ).rejects.toThrow('Custom conversation store not provided');
    });

    it('should build a TypeORM store on SQLite', async () => {
      const store = await ConvoTrackModule.createStore({
        storage: { type: 'typeorm', options: { database: ':memory:' } },
        whatsapp: {},
      });

      expect(await store.isHealthy()).toBe(true);
      await store.close();
    });
  });
});
