import { decodeCursor, encodeCursor } from '../cursor';
import { ValidationError } from '../../records/errors';

describe('cursor', () => {
  test('decodes the key it encoded', () => {
    const key = { createdAt: new Date('2024-02-03T04:05:06.789Z'), id: '0f8fad5b-d9cb-469f-a165-70867728950e' };
    const cursor = encodeCursor(key);

    expect(cursor).toMatch(/^[A-Za-z0-9_-]+$/);
    expect(decodeCursor(cursor)).toEqual(key);
  });

  test('normalizes the id to lower case', () => {
    const cursor = Buffer.from(
      JSON.stringify({ t: '2024-01-01T00:00:00.000Z', i: '0F8FAD5B-D9CB-469F-A165-70867728950E' }),
      'utf8',
    ).toString('base64url');
    expect(decodeCursor(cursor).id).toBe('0f8fad5b-d9cb-469f-a165-70867728950e');
  });

  test.each([
    ['garbage', '%%%'],
    ['not json', Buffer.from('hello', 'utf8').toString('base64url')],
    ['missing id', Buffer.from(JSON.stringify({ t: '2024-01-01T00:00:00.000Z' }), 'utf8').toString('base64url')],
    ['bad time', Buffer.from(JSON.stringify({ t: 'yesterday', i: 'x' }), 'utf8').toString('base64url')],
    ['non-uuid id', Buffer.from(JSON.stringify({ t: '2024-01-01T00:00:00.000Z', i: 'zzz' }), 'utf8').toString('base64url')],
    [
      'filter syntax in id',
      Buffer.from(JSON.stringify({ t: '2024-01-01T00:00:00.000Z', i: 'a),id.gt.0' }), 'utf8').toString('base64url'),
    ],
  ])('rejects %s', (_label, cursor) => {
    expect(() => decodeCursor(cursor)).toThrow(ValidationError);
    try {
      decodeCursor(cursor);
    } catch (error) {
      expect(error instanceof ValidationError && error.rejections[0]?.code).toBe('InvalidCursor');
    }
  });
});
