import {
  MAX_IMAGE_SIZE_BYTES,
  sanitizeFilename,
  validateContentType,
  validateCustomAttributes,
  validateDescription,
  validateDimension,
  validateOwnerId,
  validateRecordId,
  validateSize,
  validateTags,
} from '../validators';

describe('validateContentType', () => {
  test('accepts supported types case-insensitively', () => {
    expect(validateContentType('IMAGE/PNG')).toEqual({ ok: true, value: 'image/png' });
    expect(validateContentType(' image/webp ')).toEqual({ ok: true, value: 'image/webp' });
  });

  test('normalizes the image/jpg alias', () => {
    expect(validateContentType('image/jpg')).toEqual({ ok: true, value: 'image/jpeg' });
  });

  test('rejects anything else as UnsupportedType', () => {
    const result = validateContentType('image/tiff');
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.rejection.code).toBe('UnsupportedType');
      expect(result.rejection.field).toBe('contentType');
    }
  });
});

describe('validateSize', () => {
  test('accepts the upper bound', () => {
    expect(validateSize(MAX_IMAGE_SIZE_BYTES)).toEqual({ ok: true, value: 10485760 });
  });

  test('rejects zero and negatives as Empty', () => {
    for (const size of [0, -1]) {
      const result = validateSize(size);
      expect(result.ok ? undefined : result.rejection.code).toBe('Empty');
    }
  });

  test('rejects one byte over the limit as TooLarge', () => {
    const result = validateSize(MAX_IMAGE_SIZE_BYTES + 1);
    expect(result.ok ? undefined : result.rejection.code).toBe('TooLarge');
  });
});

describe('validateOwnerId', () => {
  test('accepts letters, digits and underscores', () => {
    expect(validateOwnerId('user_42')).toEqual({ ok: true, value: 'user_42' });
  });

  test.each(['ab', 'has-dash', 'with space', 'a'.repeat(101)])('rejects %p', ownerId => {
    const result = validateOwnerId(ownerId);
    expect(result.ok ? undefined : result.rejection.code).toBe('InvalidOwner');
  });
});

describe('validateRecordId', () => {
  test('lowercases a valid UUID', () => {
    expect(validateRecordId('0F8FAD5B-D9CB-469F-A165-70867728950E')).toEqual({
      ok: true,
      value: '0f8fad5b-d9cb-469f-a165-70867728950e',
    });
  });

  test('rejects non-UUIDs', () => {
    const result = validateRecordId('not-a-uuid');
    expect(result.ok ? undefined : result.rejection.code).toBe('InvalidId');
  });
});

describe('validateTags', () => {
  test('trims and collapses duplicates in first-seen order', () => {
    expect(validateTags([' cat', 'dog', 'cat ', 'dog'])).toEqual({ ok: true, value: ['cat', 'dog'] });
  });

  test('counts the limit after collapsing duplicates', () => {
    const tags = Array.from({ length: 20 }, (_, i) => `t${i}`);
    const result = validateTags([...tags, 't0', 't1']);
    expect(result.ok ? result.value.length : undefined).toBe(20);
  });

  test('rejects more than 20 distinct tags', () => {
    const result = validateTags(Array.from({ length: 21 }, (_, i) => `t${i}`));
    expect(result.ok ? undefined : result.rejection.code).toBe('InvalidTags');
  });

  test('rejects empty and overlong tags', () => {
    for (const tags of [['   '], ['x'.repeat(51)]]) {
      const result = validateTags(tags);
      expect(result.ok ? undefined : result.rejection.code).toBe('InvalidTags');
    }
  });

  test('measures tag length in characters, not UTF-16 units', () => {
    const cat = '\u{1F431}';
    expect(validateTags([cat.repeat(50)]).ok).toBe(true);

    const result = validateTags([cat.repeat(51)]);
    expect(result.ok ? undefined : result.rejection.message).toBe(
      `Tag '${cat.repeat(20)}...' exceeds 50 characters`,
    );
  });
});

describe('validateDescription', () => {
  test('missing description becomes null', () => {
    expect(validateDescription(undefined)).toEqual({ ok: true, value: null });
  });

  test('rejects more than 500 characters', () => {
    const result = validateDescription('d'.repeat(501));
    expect(result.ok ? undefined : result.rejection.code).toBe('DescriptionTooLong');
  });

  test('measures description length in characters, not UTF-16 units', () => {
    const smile = '\u{1F600}';
    expect(validateDescription(smile.repeat(500))).toEqual({ ok: true, value: smile.repeat(500) });

    const result = validateDescription(smile.repeat(501));
    expect(result.ok ? undefined : result.rejection.code).toBe('DescriptionTooLong');
  });
});

describe('validateCustomAttributes', () => {
  test('passes objects through as a copy', () => {
    const attributes = { camera: 'x100', nested: { iso: 200 } };
    const result = validateCustomAttributes(attributes);
    expect(result).toEqual({ ok: true, value: attributes });
    expect(result.ok && result.value).not.toBe(attributes);
  });

  test('rejects arrays and primitives', () => {
    for (const value of [['a'], 'text', 3]) {
      const result = validateCustomAttributes(value);
      expect(result.ok ? undefined : result.rejection.code).toBe('InvalidAttributes');
    }
  });
});

describe('validateDimension', () => {
  test('requires a positive integer', () => {
    expect(validateDimension('width', 640)).toEqual({ ok: true, value: 640 });
    const result = validateDimension('height', 1.5);
    expect(result.ok ? undefined : result.rejection).toEqual({
      code: 'InvalidDimensions',
      field: 'height',
      message: 'height must be a positive integer',
    });
  });
});

describe('sanitizeFilename', () => {
  test('strips path components', () => {
    expect(sanitizeFilename('../../etc/passwd')).toBe('passwd');
    expect(sanitizeFilename('C:\\photos\\beach.png')).toBe('beach.png');
  });

  test('replaces reserved characters and trims dots and spaces', () => {
    expect(sanitizeFilename(' my<photo>?.jpg ')).toBe('my_photo__.jpg');
    expect(sanitizeFilename('...hidden...')).toBe('hidden');
  });

  test('falls back to unnamed', () => {
    expect(sanitizeFilename('')).toBe('unnamed');
    expect(sanitizeFilename('dir/')).toBe('unnamed');
  });

  test('truncates long names keeping the extension', () => {
    const result = sanitizeFilename(`${'a'.repeat(300)}.jpeg`);
    expect(result).toHaveLength(255);
    expect(result.endsWith('.jpeg')).toBe(true);
  });
});
