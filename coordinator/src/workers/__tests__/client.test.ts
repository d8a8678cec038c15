/**
 * Worker Client Tests
 */

import { describe, it, expect } from 'vitest';
import { parseTaskResponse } from '../client.js';

describe('parseTaskResponse', () => {
  it('should return the results array', () => {
    const result = parseTaskResponse(
      JSON.stringify({ results: [{ filename: 'a.png', image_data: 'AAAA' }] })
    );

    expect(result).toEqual({
      ok: true,
      value: [{ filename: 'a.png', image_data: 'AAAA' }],
    });
  });

  it('should treat a body without results as an empty list', () => {
    expect(parseTaskResponse('{"status":"done"}')).toEqual({ ok: true, value: [] });
  });

  it('should reject a body that is not JSON', () => {
    const result = parseTaskResponse('<html>oops</html>');

    expect(result).toEqual({
      ok: false,
      failure: { reason: 'malformed-response', message: 'Response body is not JSON' },
    });
  });

  it('should reject a JSON array body', () => {
    const result = parseTaskResponse('[]');

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.failure.reason).toBe('malformed-response');
    }
  });

  it('should reject results that are not an array', () => {
    const result = parseTaskResponse('{"results":{"filename":"a.png"}}');

    expect(result).toEqual({
      ok: false,
      failure: { reason: 'malformed-response', message: '`results` is not an array' },
    });
  });
});
