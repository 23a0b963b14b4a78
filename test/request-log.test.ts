import { describe, it, expect } from 'vitest';
import { formatRequestLog, redactPath } from '../src/server/request-log.js';

describe('redactPath', () => {
  it('replaces numeric segments', () => {
    expect(redactPath('/update/12')).toBe('/update/[id]');
    expect(redactPath('/delete/7/')).toBe('/delete/[id]/');
  });

  it('replaces negative ids', () => {
    expect(redactPath('/delete/-1')).toBe('/delete/[id]');
    expect(redactPath('/update/-12/')).toBe('/update/[id]/');
  });

  it('leaves other segments alone', () => {
    expect(redactPath('/items/')).toBe('/items/');
    expect(redactPath('/update/v2')).toBe('/update/v2');
  });
});

describe('formatRequestLog', () => {
  it('formats a request line', () => {
    expect(formatRequestLog({ method: 'PUT', path: '/update/3', status: 404, durationMs: 5 }))
      .toBe('[Request] PUT /update/[id] 404 5ms');
  });
});
