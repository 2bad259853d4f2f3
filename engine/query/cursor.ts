import { z } from 'zod';
import { SortKey } from '../records/types';
import { ValidationError } from '../records/errors';
import { validateRecordId } from '../validation/validators';

const cursorPayloadSchema = z.object({
  t: z.string().datetime(),
  i: z.string().min(1),
});

/**
 * Opaque pagination token: the index sort key of the resume point, as
 * base64url JSON. Reproduces the same page for as long as the underlying
 * records are unchanged.
 */
export function encodeCursor(key: SortKey): string {
  return Buffer.from(JSON.stringify({ t: key.createdAt.toISOString(), i: key.id }), 'utf8').toString('base64url');
}

export function decodeCursor(cursor: string): SortKey {
  let payload: unknown;
  try {
    payload = JSON.parse(Buffer.from(cursor, 'base64url').toString('utf8'));
  } catch {
    throw invalidCursor();
  }

  const parsed = cursorPayloadSchema.safeParse(payload);
  if (!parsed.success) {
    throw invalidCursor();
  }
  // the id is spliced into the store's resume filter
  const id = validateRecordId(parsed.data.i);
  if (!id.ok) {
    throw invalidCursor();
  }
  return { createdAt: new Date(parsed.data.t), id: id.value };
}

function invalidCursor(): ValidationError {
  return new ValidationError([{ code: 'InvalidCursor', field: 'cursor', message: 'Cursor is malformed' }]);
}
