import type {
  ImageCodecPort,
  RecognitionEnginePort,
  RecognitionRequest,
  RecognizedLine,
} from '@region-ocr/core';
import { RecognitionFailureError, SharpImageCodec, fromPixelBox } from '@region-ocr/core';
import { OcrAuthenticationError } from './exceptions.js';

export type HttpPostFn = (
  url: string,
  options: { body: string; headers: Record<string, string> },
) => Promise<{ status: number; body: string }>;

export const fetchPost: HttpPostFn = async (url, options) => {
  const res = await fetch(url, { method: 'POST', body: options.body, headers: options.headers });
  return { status: res.status, body: await res.text() };
};

export interface GoogleVisionEngineConfig {
  readonly apiKey: string;
  readonly languageHints?: string[];
  readonly httpPost?: HttpPostFn;
  readonly codec?: ImageCodecPort;
}

interface VisionVertex {
  x?: number;
  y?: number;
}

interface VisionBlock {
  paragraphs?: VisionParagraph[];
}

interface VisionParagraph {
  confidence?: number;
  boundingBox?: { vertices?: VisionVertex[] };
  words?: VisionWord[];
}

interface VisionWord {
  boundingBox?: { vertices?: VisionVertex[] };
  symbols?: VisionSymbol[];
}

type VisionBreakType =
  | 'UNKNOWN'
  | 'SPACE'
  | 'SURE_SPACE'
  | 'EOL_SURE_SPACE'
  | 'HYPHEN'
  | 'LINE_BREAK';

interface VisionSymbol {
  text?: string;
  property?: { detectedBreak?: { type?: VisionBreakType } };
}

interface PendingLine {
  words: string[];
  vertices: VisionVertex[];
}

const LINE_ENDING_BREAKS: ReadonlySet<VisionBreakType> = new Set(['EOL_SURE_SPACE', 'LINE_BREAK', 'HYPHEN']);

interface VisionPage {
  blocks?: VisionBlock[];
}

interface VisionResponse {
  responses?: Array<{
    fullTextAnnotation?: {
      text?: string;
      pages?: VisionPage[];
    };
    error?: { message?: string; code?: number };
  }>;
}

type VisionFeature = 'DOCUMENT_TEXT_DETECTION' | 'TEXT_DETECTION';

const VISION_API_URL = 'https://vision.googleapis.com/v1/images:annotate';

export class GoogleVisionEngine implements RecognitionEnginePort {
  // The API has no region-of-interest parameter; callers crop first.
  readonly supportsRegionHint = false;

  private readonly httpPost: HttpPostFn;
  private readonly codec: ImageCodecPort;

  constructor(private readonly config: GoogleVisionEngineConfig) {
    this.httpPost = config.httpPost ?? fetchPost;
    this.codec = config.codec ?? new SharpImageCodec();
  }

  async recognize(request: RecognitionRequest): Promise<RecognizedLine[]> {
    const response = await this.callApi(request);
    return this.mapResponse(response, request.image.width, request.image.height);
  }

  /** Dense document mode applies language modelling; plain text detection reads more literally. */
  static featureFor(request: Pick<RecognitionRequest, 'digitsOnly' | 'quality' | 'languageCorrection'>): VisionFeature {
    if (request.digitsOnly || !request.languageCorrection || request.quality === 'fast') {
      return 'TEXT_DETECTION';
    }
    return 'DOCUMENT_TEXT_DETECTION';
  }

  private async callApi(request: RecognitionRequest): Promise<VisionResponse> {
    const png = await this.codec.encode(request.image, 'png');
    const languageHints = this.config.languageHints;

    const body = {
      requests: [
        {
          image: { content: Buffer.from(png).toString('base64') },
          features: [{ type: GoogleVisionEngine.featureFor(request) }],
          ...(languageHints?.length ? { imageContext: { languageHints } } : {}),
        },
      ],
    };

    let res: { status: number; body: string };
    try {
      res = await this.httpPost(`${VISION_API_URL}?key=${this.config.apiKey}`, {
        body: JSON.stringify(body),
        headers: { 'Content-Type': 'application/json' },
      });
    } catch (error) {
      throw new RecognitionFailureError(
        `Vision API request failed: ${error instanceof Error ? error.message : String(error)}`,
        error,
      );
    }

    if (res.status === 401 || res.status === 403) {
      throw new OcrAuthenticationError(res.status, res.body);
    }

    if (res.status < 200 || res.status >= 300) {
      throw new RecognitionFailureError(`Vision API error (${res.status}): ${res.body}`);
    }

    try {
      return JSON.parse(res.body) as VisionResponse;
    } catch (error) {
      throw new RecognitionFailureError('Vision API returned malformed JSON', error);
    }
  }

  private mapResponse(response: VisionResponse, width: number, height: number): RecognizedLine[] {
    const annotation = response.responses?.[0]?.fullTextAnnotation;
    const apiError = response.responses?.[0]?.error;

    if (apiError) {
      throw new RecognitionFailureError(`Vision API error: ${apiError.message ?? 'Unknown error'}`);
    }

    if (!annotation) {
      return [];
    }

    const paragraphs = (annotation.pages ?? [])
      .flatMap((page) => page.blocks ?? [])
      .flatMap((block) => block.paragraphs ?? []);

    return paragraphs.flatMap((paragraph) => {
      const confidence = Math.round((paragraph.confidence ?? 0) * 100);
      return this.splitLines(paragraph).map((line) => ({
        text: line.words.join(' '),
        confidence,
        boundingBox: fromPixelBox(
          this.extractBoundingBox(line.vertices.length > 0 ? line.vertices : paragraph.boundingBox?.vertices),
          width,
          height,
        ),
      }));
    });
  }

  /** Breaks a paragraph into visual lines at the breaks Vision reports after a word's last symbol. */
  private splitLines(paragraph: VisionParagraph): PendingLine[] {
    const lines: PendingLine[] = [];
    let current: PendingLine = { words: [], vertices: [] };

    for (const word of paragraph.words ?? []) {
      const symbols = word.symbols ?? [];
      const breakType = symbols[symbols.length - 1]?.property?.detectedBreak?.type;
      let text = symbols.map((s) => s.text ?? '').join('');
      if (breakType === 'HYPHEN') text += '-';

      current.words.push(text);
      current.vertices.push(...(word.boundingBox?.vertices ?? []));

      if (breakType && LINE_ENDING_BREAKS.has(breakType)) {
        lines.push(current);
        current = { words: [], vertices: [] };
      }
    }
    if (current.words.length > 0) {
      lines.push(current);
    }
    return lines;
  }

  private extractBoundingBox(vertices?: VisionVertex[]): {
    x: number;
    y: number;
    width: number;
    height: number;
  } {
    if (!vertices || vertices.length === 0) {
      return { x: 0, y: 0, width: 0, height: 0 };
    }
    const xs = vertices.map((v) => v.x ?? 0);
    const ys = vertices.map((v) => v.y ?? 0);
    const x = Math.min(...xs);
    const y = Math.min(...ys);
    return { x, y, width: Math.max(...xs) - x, height: Math.max(...ys) - y };
  }
}
