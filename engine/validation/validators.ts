/**
 * Input validation for image records.
 *
 * Every check is pure: it returns either the normalized value or a tagged
 * rejection. Nothing here touches a store, so a failed check can never leave
 * partial state behind.
 */

export type RejectionCode =
  | 'UnsupportedType'
  | 'TooLarge'
  | 'Empty'
  | 'InvalidOwner'
  | 'InvalidTags'
  | 'DescriptionTooLong'
  | 'InvalidAttributes'
  | 'InvalidId'
  | 'InvalidStatus'
  | 'InvalidDimensions'
  | 'InvalidTtl'
  | 'InvalidLimit'
  | 'InvalidTimeRange'
  | 'InvalidSizeRange'
  | 'InvalidCursor';

export interface ValidationRejection {
  code: RejectionCode;
  field: string;
  message: string;
}

export type Validated<T> =
  | { ok: true; value: T }
  | { ok: false; rejection: ValidationRejection };

export const SUPPORTED_CONTENT_TYPES = ['image/jpeg', 'image/png', 'image/gif', 'image/webp'] as const;
export type SupportedContentType = (typeof SUPPORTED_CONTENT_TYPES)[number];

const CONTENT_TYPE_ALIASES: Record<string, SupportedContentType> = {
  'image/jpg': 'image/jpeg',
};

export const MAX_IMAGE_SIZE_BYTES = 10 * 1024 * 1024; // 10 MB
export const MAX_TAGS = 20;
export const MAX_TAG_LENGTH = 50;
export const MAX_DESCRIPTION_LENGTH = 500;
export const MAX_FILENAME_LENGTH = 255;

const OWNER_ID_PATTERN = /^[A-Za-z0-9_]{3,100}$/;
const RECORD_ID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;
const UNSAFE_FILENAME_CHARS = /[<>:"/\\|?*\x00-\x1f]/g;

const accept = <T>(value: T): Validated<T> => ({ ok: true, value });

const reject = <T>(code: RejectionCode, field: string, message: string): Validated<T> => ({
  ok: false,
  rejection: { code, field, message },
});

function isSupportedContentType(value: string): value is SupportedContentType {
  return SUPPORTED_CONTENT_TYPES.some(type => type === value);
}

export function validateContentType(contentType: string): Validated<SupportedContentType> {
  const normalized = contentType.trim().toLowerCase();
  const resolved = CONTENT_TYPE_ALIASES[normalized] ?? normalized;
  if (!isSupportedContentType(resolved)) {
    return reject('UnsupportedType', 'contentType', `Content type '${contentType}' is not allowed`);
  }
  return accept(resolved);
}

export function validateSize(sizeBytes: number): Validated<number> {
  if (!Number.isInteger(sizeBytes)) {
    return reject('Empty', 'sizeBytes', 'Size must be a whole number of bytes');
  }
  if (sizeBytes <= 0) {
    return reject('Empty', 'sizeBytes', 'Size must be greater than 0');
  }
  if (sizeBytes > MAX_IMAGE_SIZE_BYTES) {
    return reject('TooLarge', 'sizeBytes', `Size ${sizeBytes} exceeds ${MAX_IMAGE_SIZE_BYTES} bytes`);
  }
  return accept(sizeBytes);
}

export function validateOwnerId(ownerId: string): Validated<string> {
  if (!OWNER_ID_PATTERN.test(ownerId)) {
    return reject('InvalidOwner', 'ownerId', 'Owner id must be 3-100 letters, digits or underscores');
  }
  return accept(ownerId);
}

export function validateRecordId(recordId: string): Validated<string> {
  if (!RECORD_ID_PATTERN.test(recordId)) {
    return reject('InvalidId', 'recordId', 'Record id must be a UUID');
  }
  return accept(recordId.toLowerCase());
}

/**
 * Trims each tag and collapses duplicates, keeping first-seen order.
 * The entry limit applies after collapsing.
 */
export function validateTags(tags: ReadonlyArray<string>): Validated<string[]> {
  const unique: string[] = [];
  for (const raw of tags) {
    const tag = raw.trim();
    if (tag.length === 0) {
      return reject('InvalidTags', 'tags', 'Tags cannot be empty');
    }
    const chars = [...tag];
    if (chars.length > MAX_TAG_LENGTH) {
      return reject('InvalidTags', 'tags', `Tag '${chars.slice(0, 20).join('')}...' exceeds ${MAX_TAG_LENGTH} characters`);
    }
    if (!unique.includes(tag)) {
      unique.push(tag);
    }
  }
  if (unique.length > MAX_TAGS) {
    return reject('InvalidTags', 'tags', `At most ${MAX_TAGS} tags are allowed`);
  }
  return accept(unique);
}

export function validateDescription(description: string | null | undefined): Validated<string | null> {
  if (description === undefined || description === null) {
    return accept(null);
  }
  if ([...description].length > MAX_DESCRIPTION_LENGTH) {
    return reject('DescriptionTooLong', 'description', `Description exceeds ${MAX_DESCRIPTION_LENGTH} characters`);
  }
  return accept(description);
}

export function validateCustomAttributes(attributes: unknown): Validated<{ [key: string]: unknown }> {
  if (attributes === undefined || attributes === null) {
    return accept({});
  }
  if (typeof attributes !== 'object' || Array.isArray(attributes)) {
    return reject('InvalidAttributes', 'customAttributes', 'Custom attributes must be an object');
  }
  return accept({ ...attributes });
}

export function validateDimension(field: 'width' | 'height', value: number): Validated<number> {
  if (!Number.isInteger(value) || value <= 0) {
    return reject('InvalidDimensions', field, `${field} must be a positive integer`);
  }
  return accept(value);
}

/**
 * Strips path components and characters that are unsafe in object keys.
 * Long names are cut down while keeping the extension.
 */
export function sanitizeFilename(filename: string): string {
  const base = filename.split('/').pop()?.split('\\').pop() ?? '';
  let cleaned = base.replace(UNSAFE_FILENAME_CHARS, '_').replace(/^[ .]+|[ .]+$/g, '');

  if (cleaned.length > MAX_FILENAME_LENGTH) {
    const dot = cleaned.lastIndexOf('.');
    if (dot > 0) {
      const ext = cleaned.slice(dot + 1);
      cleaned = `${cleaned.slice(0, MAX_FILENAME_LENGTH - ext.length - 1)}.${ext}`;
    } else {
      cleaned = cleaned.slice(0, MAX_FILENAME_LENGTH);
    }
  }

  return cleaned || 'unnamed';
}
