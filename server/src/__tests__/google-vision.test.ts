import { describe, it, expect, vi } from 'vitest';
import { GoogleVisionTool, toVisionResult } from '../tools/google-vision.js';
import { VisionError } from '../lib/errors.js';

const IMAGE = 'https://cf.bstatic.com/xdata/images/hotel/max1024x768/1.jpg';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'content-type': 'application/json' } });
}

describe('toVisionResult', () => {
  it('keeps labels above 0.75 and objects above 0.6', () => {
    expect(toVisionResult({
      labelAnnotations: [
        { description: 'Swimming pool', score: 0.93 },
        { description: 'Sky', score: 0.75 },
        { description: 'Tree', score: 0.4 },
        { description: 'Unscored' },
      ],
      localizedObjectAnnotations: [
        { name: 'Chair', score: 0.61 },
        { name: 'Umbrella', score: 0.6 },
      ],
    })).toEqual({ labels: ['Swimming pool'], objects: ['Chair'], text: [] });
  });

  it('skips the first text annotation, which is the whole block', () => {
    expect(toVisionResult({
      textAnnotations: [{ description: 'SPA\nOPEN' }, { description: 'SPA' }, { description: 'OPEN' }],
    }).text).toEqual(['SPA', 'OPEN']);
  });
});

describe('GoogleVisionTool', () => {
  it('posts the image URL with the key and maps the annotation', async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => jsonResponse({
      responses: [{ labelAnnotations: [{ description: 'Pool', score: 0.95 }] }],
    }));
    const tool = new GoogleVisionTool({ apiKey: 'test-key', fetchImpl });

    await expect(tool.analyze(IMAGE)).resolves.toEqual({ labels: ['Pool'], objects: [], text: [] });

    const [url, init] = fetchImpl.mock.calls[0];
    expect(url).toBe('https://vision.googleapis.com/v1/images:annotate?key=test-key');
    expect(JSON.parse(String(init?.body))).toMatchObject({
      requests: [{ image: { source: { imageUri: IMAGE } } }],
    });
  });

  it('raises VisionError carrying the image URL on HTTP failure', async () => {
    const tool = new GoogleVisionTool({
      apiKey: 'test-key',
      fetchImpl: vi.fn<typeof fetch>(async () => jsonResponse({}, 500)),
    });

    const error = await tool.analyze(IMAGE).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(VisionError);
    expect(error).toMatchObject({
      message: 'Vision request failed: Vision API error (500)',
      image_url: IMAGE,
      category: 'vision',
    });
  });

  it('raises VisionError when the image could not be annotated', async () => {
    const tool = new GoogleVisionTool({
      apiKey: 'test-key',
      fetchImpl: vi.fn<typeof fetch>(async () => jsonResponse({
        responses: [{ error: { code: 3, message: 'Bad image data.' } }],
      })),
    });

    await expect(tool.analyze(IMAGE)).rejects.toThrow('Vision API could not annotate image: Bad image data.');
  });

  it('raises VisionError when the response has no annotation', async () => {
    const tool = new GoogleVisionTool({
      apiKey: 'test-key',
      fetchImpl: vi.fn<typeof fetch>(async () => jsonResponse({ responses: [] })),
    });

    await expect(tool.analyze(IMAGE)).rejects.toThrow('Vision API returned no annotation');
  });
});
