/**
 * Unit Tests for Type Definitions
 *
 * Tests the exported types and constants.
 */

import {
  ImageGenerationRequest,
  ImageGenerationResult,
  ImageProvider,
  LOG_LEVEL_PRIORITY,
  PollOutcome,
  isLogLevel,
} from '../../../src/middleware/types';

// ============================================================
// TESTS
// ============================================================

describe('ImageProvider enum', () => {
  it('should have correct values', () => {
    expect(ImageProvider.BLACKFOREST).toBe('blackforest');
    expect(ImageProvider.IDEOGRAM).toBe('ideogram');
    expect(ImageProvider.LUMA).toBe('luma');
    expect(ImageProvider.RUNWAY).toBe('runway');
    expect(ImageProvider.STABILITY).toBe('stability');
    expect(ImageProvider.OPENAI).toBe('openai');
  });

  it('should have exactly 6 providers', () => {
    expect(Object.values(ImageProvider)).toHaveLength(6);
  });
});

describe('Log levels', () => {
  it('should order levels by severity', () => {
    expect(LOG_LEVEL_PRIORITY.debug).toBeLessThan(LOG_LEVEL_PRIORITY.info);
    expect(LOG_LEVEL_PRIORITY.warn).toBeLessThan(LOG_LEVEL_PRIORITY.error);
    expect(LOG_LEVEL_PRIORITY.error).toBeLessThan(LOG_LEVEL_PRIORITY.silent);
  });

  it('should recognize valid level names only', () => {
    expect(isLogLevel('warn')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
    expect(isLogLevel('toString')).toBe(false);
  });
});

describe('Type exports', () => {
  it('should accept a minimal request', () => {
    const request: ImageGenerationRequest = { prompt: 'a red fox' };
    expect(request.prompt).toBe('a red fox');
  });

  it('should describe a result', () => {
    const result: ImageGenerationResult = {
      created: 1700000000,
      data: [{ url: 'https://cdn.test/a.png', revised_prompt: 'a red fox' }],
    };
    expect(result.data).toHaveLength(1);
  });

  it('should narrow poll outcomes by state', () => {
    const outcome: PollOutcome<string> = { state: 'failed', reason: 'moderated' };
    const reason = outcome.state === 'failed' ? outcome.reason : undefined;
    expect(reason).toBe('moderated');
  });
});
