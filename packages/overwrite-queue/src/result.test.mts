import { describe, expect, it } from 'vitest';

import { QueueTimeoutError } from './errors.mjs';
import { Result } from './result.mjs';

describe('Result', () => {
  it('should build success and failure values', () => {
    const error = new QueueTimeoutError('popWithTimeout', 5);

    expect(Result.ok(42)).toEqual({ success: true, data: 42 });
    expect(Result.err(error)).toEqual({ success: false, error });
  });
});
