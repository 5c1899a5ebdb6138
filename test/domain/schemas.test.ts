import { describe, it, expect } from 'vitest';
import { invocationEvent, remotePdfRequest } from '../../src/domain/schemas.js';

describe('remotePdfRequest', () => {
  it('accepts a string pdf_url', () => {
    const result = remotePdfRequest.safeParse({ pdf_url: 'https://example.com/a.pdf' });
    expect(result.success).toBe(true);
  });

  it('rejects a non-string pdf_url', () => {
    expect(remotePdfRequest.safeParse({ pdf_url: 42 }).success).toBe(false);
  });

  it('rejects an object without pdf_url', () => {
    expect(remotePdfRequest.safeParse({ url: 'https://example.com/a.pdf' }).success).toBe(false);
  });
});

describe('invocationEvent', () => {
  it('accepts an event without a body', () => {
    const result = invocationEvent.safeParse({});
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.body).toBeUndefined();
    }
  });

  it('keeps a binary body as the same buffer', () => {
    const body = Buffer.from('%PDF');
    const result = invocationEvent.safeParse({ body, isBase64Encoded: false });
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.body).toBe(body);
    }
  });

  it('ignores a non-boolean isBase64Encoded', () => {
    const result = invocationEvent.safeParse({ body: 'JVBERi0=', isBase64Encoded: 'true' });
    expect(result.success).toBe(true);
  });

  it('rejects a non-object event', () => {
    expect(invocationEvent.safeParse('body').success).toBe(false);
    expect(invocationEvent.safeParse(null).success).toBe(false);
  });
});
