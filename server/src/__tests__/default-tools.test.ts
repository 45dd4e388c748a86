import { describe, it, expect, vi } from 'vitest';
import { createDefaultTools } from '../tools/index.js';
import { NoopSearchTool, PerplexitySearchTool } from '../tools/perplexity-search.js';
import { GoogleVisionTool } from '../tools/google-vision.js';
import { VisionError } from '../lib/errors.js';
import logger from '../lib/logger.js';
import { fakeLLM } from './helpers/pipeline-fakes.js';

describe('createDefaultTools', () => {
  it('uses the configured search and vision backends', () => {
    const tools = createDefaultTools(fakeLLM('[]'), logger, {
      PERPLEXITY_API_KEY: 'test-key',
      GOOGLE_VISION_API_KEY: 'test-key',
    });

    expect(tools.search).toBeInstanceOf(PerplexitySearchTool);
    expect(tools.vision).toBeInstanceOf(GoogleVisionTool);
  });

  it('degrades search and vision when their keys are missing', async () => {
    const warn = vi.spyOn(logger, 'warn');
    const tools = createDefaultTools(fakeLLM('[]'), logger, {});

    expect(tools.search).toBeInstanceOf(NoopSearchTool);
    await expect(tools.vision.analyze('https://cf.bstatic.com/xdata/images/hotel/1.jpg')).rejects.toBeInstanceOf(VisionError);
    expect(warn).toHaveBeenCalledWith('PERPLEXITY_API_KEY not set, site enrichment will be empty');
    expect(warn).toHaveBeenCalledWith('GOOGLE_VISION_API_KEY not set, images will not be tagged');
    warn.mockRestore();
  });
});
