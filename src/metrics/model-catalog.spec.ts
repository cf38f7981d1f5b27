import {
  DEFAULT_MODEL_CATALOG,
  isWellFormedExtension,
  modelCatalogSchema,
  parseExtensionEntry,
} from './model-catalog';

describe('model catalog', () => {
  describe('isWellFormedExtension', () => {
    it.each([
      'mic_type:type,ntc_state,obd_src,status',
      'status',
      'a:b',
      'a,b:c,d',
    ])('should accept %p', (entry) => {
      expect(isWellFormedExtension(entry)).toBe(true);
    });

    it.each([
      '',
      'mic_type:',
      ':type',
      'a::b',
      'a:b:c',
      'a,,b',
      'a,',
      'mic type',
      'a-b',
    ])('should reject %p', (entry) => {
      expect(isWellFormedExtension(entry)).toBe(false);
    });
  });

  describe('parseExtensionEntry', () => {
    it('should split fields and aliases', () => {
      expect(parseExtensionEntry('mic_type:type,ntc_state,obd_src,status')).toEqual([
        { field: 'mic_type', alias: 'type' },
        { field: 'ntc_state' },
        { field: 'obd_src' },
        { field: 'status' },
      ]);
    });
  });

  describe('DEFAULT_MODEL_CATALOG', () => {
    it('should know the HS110 and KP115 line budgets', () => {
      expect(DEFAULT_MODEL_CATALOG.lineBudgets).toEqual({
        HS110_EU_: 23,
        KP115_EU_: 25,
      });
    });

    it('should only contain well-formed extensions', () => {
      for (const entry of Object.values(DEFAULT_MODEL_CATALOG.extensions)) {
        expect(isWellFormedExtension(entry)).toBe(true);
      }
    });
  });

  describe('modelCatalogSchema', () => {
    it('should default extensions to an empty map', () => {
      expect(modelCatalogSchema.parse({ lineBudgets: { X: 1 } })).toEqual({
        lineBudgets: { X: 1 },
        extensions: {},
      });
    });

    it('should reject non-positive line budgets', () => {
      expect(modelCatalogSchema.safeParse({ lineBudgets: { X: 0 } }).success).toBe(
        false,
      );
    });
  });
});
