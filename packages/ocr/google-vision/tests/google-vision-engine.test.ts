import { beforeEach, describe, expect, it, vi } from 'vitest';
import type { ImageCodecPort, RecognitionEnginePort, RecognitionRequest } from '@region-ocr/core';
import { RecognitionFailureError, createImageBuffer } from '@region-ocr/core';
import { OcrAuthenticationError } from '../src/exceptions.js';
import type { HttpPostFn } from '../src/google-vision-engine.js';
import { GoogleVisionEngine } from '../src/google-vision-engine.js';

const MOCK_VISION_RESPONSE = {
  responses: [
    {
      fullTextAnnotation: {
        text: 'Invoice 1042\nTotal 42.50\n',
        pages: [
          {
            blocks: [
              {
                paragraphs: [
                  {
                    confidence: 0.97,
                    boundingBox: {
                      vertices: [
                        { x: 40, y: 20 },
                        { x: 240, y: 20 },
                        { x: 240, y: 60 },
                        { x: 40, y: 60 },
                      ],
                    },
                    words: [
                      { symbols: [{ text: 'I' }, { text: 'n' }, { text: 'v' }, { text: 'o' }, { text: 'i' }, { text: 'c' }, { text: 'e' }] },
                      { symbols: [{ text: '1' }, { text: '0' }, { text: '4' }, { text: '2' }] },
                    ],
                  },
                ],
              },
              {
                paragraphs: [
                  {
                    confidence: 0.93,
                    boundingBox: {
                      vertices: [
                        { x: 40, y: 100 },
                        { x: 360, y: 100 },
                        { x: 360, y: 140 },
                        { x: 40, y: 140 },
                      ],
                    },
                    words: [
                      { symbols: [{ text: 'T' }, { text: 'o' }, { text: 't' }, { text: 'a' }, { text: 'l' }] },
                      { symbols: [{ text: '4' }, { text: '2' }, { text: '.' }, { text: '5' }, { text: '0' }] },
                    ],
                  },
                ],
              },
            ],
          },
        ],
      },
    },
  ],
};

function createCodec(): ImageCodecPort {
  return {
    decode: vi.fn(),
    encode: vi.fn(() => Promise.resolve(new Uint8Array([1, 2, 3]))),
  };
}

function createRequest(overrides: Partial<RecognitionRequest> = {}): RecognitionRequest {
  return {
    image: createImageBuffer({ data: new Uint8Array(400 * 200), width: 400, height: 200, layout: 'gray' }),
    digitsOnly: false,
    quality: 'accurate',
    languageCorrection: true,
    ...overrides,
  };
}

function mockHttpPost(status: number, body: unknown) {
  return vi.fn<HttpPostFn>(() =>
    Promise.resolve({ status, body: typeof body === 'string' ? body : JSON.stringify(body) }),
  );
}

function sentBody(httpPost: ReturnType<typeof mockHttpPost>) {
  return JSON.parse(httpPost.mock.calls[0][1].body);
}

describe('GoogleVisionEngine', () => {
  beforeEach(() => {
    vi.restoreAllMocks();
  });

  it('implements RecognitionEnginePort without region hint support', () => {
    const engine: RecognitionEnginePort = new GoogleVisionEngine({
      apiKey: 'test-key',
      httpPost: mockHttpPost(200, MOCK_VISION_RESPONSE),
      codec: createCodec(),
    });
    expect(engine.supportsRegionHint).toBe(false);
  });

  it('maps paragraphs to lines with normalized boxes', async () => {
    const engine = new GoogleVisionEngine({
      apiKey: 'test-key',
      httpPost: mockHttpPost(200, MOCK_VISION_RESPONSE),
      codec: createCodec(),
    });

    const lines = await engine.recognize(createRequest());

    expect(lines).toEqual([
      {
        text: 'Invoice 1042',
        confidence: 97,
        boundingBox: { x: 0.1, y: 0.1, width: 0.5, height: 0.2 },
      },
      {
        text: 'Total 42.50',
        confidence: 93,
        boundingBox: { x: 0.1, y: 0.5, width: 0.8, height: 0.2 },
      },
    ]);
  });

  it('splits a paragraph into lines at detected line breaks', async () => {
    const word = (text: string, x0: number, y0: number, x1: number, y1: number, breakType: string) => ({
      boundingBox: { vertices: [{ x: x0, y: y0 }, { x: x1, y: y0 }, { x: x1, y: y1 }, { x: x0, y: y1 }] },
      symbols: [...text].map((ch, i) =>
        i === text.length - 1 ? { text: ch, property: { detectedBreak: { type: breakType } } } : { text: ch },
      ),
    });
    const response = {
      responses: [
        {
          fullTextAnnotation: {
            pages: [
              {
                blocks: [
                  {
                    paragraphs: [
                      {
                        confidence: 0.9,
                        words: [
                          word('Subtotal', 40, 20, 200, 60, 'SPACE'),
                          word('38.00', 220, 20, 360, 60, 'EOL_SURE_SPACE'),
                          word('Tax', 40, 80, 120, 120, 'SPACE'),
                          word('4.50', 140, 80, 240, 120, 'LINE_BREAK'),
                        ],
                      },
                    ],
                  },
                ],
              },
            ],
          },
        },
      ],
    };
    const engine = new GoogleVisionEngine({
      apiKey: 'test-key',
      httpPost: mockHttpPost(200, response),
      codec: createCodec(),
    });

    const lines = await engine.recognize(createRequest());

    expect(lines).toEqual([
      { text: 'Subtotal 38.00', confidence: 90, boundingBox: { x: 0.1, y: 0.1, width: 0.8, height: 0.2 } },
      { text: 'Tax 4.50', confidence: 90, boundingBox: { x: 0.1, y: 0.4, width: 0.5, height: 0.2 } },
    ]);
  });

  it('passes the API key as a query parameter and the image as base64', async () => {
    const httpPost = mockHttpPost(200, MOCK_VISION_RESPONSE);
    const engine = new GoogleVisionEngine({ apiKey: 'my-api-key', httpPost, codec: createCodec() });

    await engine.recognize(createRequest());

    expect(httpPost.mock.calls[0][0]).toBe(
      'https://vision.googleapis.com/v1/images:annotate?key=my-api-key',
    );
    expect(sentBody(httpPost).requests[0].image).toEqual({ content: 'AQID' });
  });

  it('uses document detection for corrected text', async () => {
    const httpPost = mockHttpPost(200, MOCK_VISION_RESPONSE);
    const engine = new GoogleVisionEngine({ apiKey: 'test-key', httpPost, codec: createCodec() });

    await engine.recognize(createRequest());

    expect(sentBody(httpPost).requests[0].features).toEqual([{ type: 'DOCUMENT_TEXT_DETECTION' }]);
  });

  it('uses plain text detection for digits', async () => {
    const httpPost = mockHttpPost(200, MOCK_VISION_RESPONSE);
    const engine = new GoogleVisionEngine({ apiKey: 'test-key', httpPost, codec: createCodec() });

    await engine.recognize(createRequest({ digitsOnly: true, languageCorrection: false }));

    expect(sentBody(httpPost).requests[0].features).toEqual([{ type: 'TEXT_DETECTION' }]);
  });

  it('sends languageHints in imageContext', async () => {
    const httpPost = mockHttpPost(200, MOCK_VISION_RESPONSE);
    const engine = new GoogleVisionEngine({
      apiKey: 'test-key',
      languageHints: ['en', 'de'],
      httpPost,
      codec: createCodec(),
    });

    await engine.recognize(createRequest());

    expect(sentBody(httpPost).requests[0].imageContext).toEqual({ languageHints: ['en', 'de'] });
  });

  it('omits imageContext without languageHints', async () => {
    const httpPost = mockHttpPost(200, MOCK_VISION_RESPONSE);
    const engine = new GoogleVisionEngine({ apiKey: 'test-key', httpPost, codec: createCodec() });

    await engine.recognize(createRequest());

    expect(sentBody(httpPost).requests[0].imageContext).toBeUndefined();
  });

  it('returns no lines when there is no annotation', async () => {
    const engine = new GoogleVisionEngine({
      apiKey: 'test-key',
      httpPost: mockHttpPost(200, { responses: [{}] }),
      codec: createCodec(),
    });

    expect(await engine.recognize(createRequest())).toEqual([]);
  });

  it('throws OcrAuthenticationError on 403', async () => {
    const engine = new GoogleVisionEngine({
      apiKey: 'bad-key',
      httpPost: mockHttpPost(403, 'forbidden'),
      codec: createCodec(),
    });

    await expect(engine.recognize(createRequest())).rejects.toBeInstanceOf(OcrAuthenticationError);
  });

  it('throws RecognitionFailureError on server errors', async () => {
    const engine = new GoogleVisionEngine({
      apiKey: 'test-key',
      httpPost: mockHttpPost(500, 'boom'),
      codec: createCodec(),
    });

    await expect(engine.recognize(createRequest())).rejects.toThrow('Vision API error (500): boom');
  });

  it('throws RecognitionFailureError when the response carries an error', async () => {
    const engine = new GoogleVisionEngine({
      apiKey: 'test-key',
      httpPost: mockHttpPost(200, { responses: [{ error: { message: 'Bad image data.' } }] }),
      codec: createCodec(),
    });

    await expect(engine.recognize(createRequest())).rejects.toThrow('Vision API error: Bad image data.');
  });

  it('wraps transport failures', async () => {
    const httpPost = vi.fn<HttpPostFn>(() => Promise.reject(new Error('socket hang up')));
    const engine = new GoogleVisionEngine({ apiKey: 'test-key', httpPost, codec: createCodec() });

    const error = await engine.recognize(createRequest()).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RecognitionFailureError);
    expect(error).toHaveProperty('message', 'Vision API request failed: socket hang up');
  });
});
