import fs from "fs";
import { Auth, google, vision_v1 } from "googleapis";

export interface OcrLine {
  text: string;
  confidence: number;
}

export interface OcrEngine {
  recognize(imagePath: string): Promise<OcrLine[]>;
}

// Breaks after which the next symbol starts a new line
const LINE_BREAKS = new Set(["EOL_SURE_SPACE", "LINE_BREAK", "HYPHEN"]);
const SPACE_BREAKS = new Set(["SPACE", "SURE_SPACE"]);

const average = (values: number[]): number => {
  if (values.length === 0) return 0;
  return values.reduce((sum, value) => sum + value, 0) / values.length;
};

/**
 * Rebuilds text lines from a Vision document annotation, walking
 * pages > blocks > paragraphs > words > symbols and splitting on detected line breaks.
 * A line's confidence is the mean of its words' confidences.
 */
export const linesFromAnnotation = (annotation: vision_v1.Schema$TextAnnotation | null | undefined): OcrLine[] => {
  const lines: OcrLine[] = [];
  let text = "";
  let confidences: number[] = [];

  const flush = () => {
    const trimmed = text.trim();
    if (trimmed) {
      lines.push({ text: trimmed, confidence: average(confidences) });
    }
    text = "";
    confidences = [];
  };

  for (const page of annotation?.pages ?? []) {
    for (const block of page.blocks ?? []) {
      for (const paragraph of block.paragraphs ?? []) {
        for (const word of paragraph.words ?? []) {
          if (typeof word.confidence === "number") {
            confidences.push(word.confidence);
          }

          for (const symbol of word.symbols ?? []) {
            text += symbol.text ?? "";

            const breakType = symbol.property?.detectedBreak?.type ?? "";
            if (breakType === "HYPHEN") {
              text += "-";
            }
            if (SPACE_BREAKS.has(breakType)) {
              text += " ";
            } else if (LINE_BREAKS.has(breakType)) {
              flush();
            }
          }
        }
      }
      // Blocks never continue a line from the previous block
      flush();
    }
  }

  return lines;
};

/**
 * Joins recognized lines in engine order, single-space separated
 */
export const joinOcrLines = (lines: OcrLine[]): string => {
  return lines.map((line) => line.text).join(" ");
};

export type VisionClient = {
  images: Pick<vision_v1.Resource$Images, "annotate">;
};

export class GoogleVisionOcrEngine implements OcrEngine {
  constructor(
    private readonly vision: VisionClient,
    private readonly timeoutMs: number
  ) {}

  async recognize(imagePath: string): Promise<OcrLine[]> {
    const imageBuffer = await fs.promises.readFile(imagePath);
    console.log(`📊 Image size: ${Math.round(imageBuffer.length / 1024)} KB`);

    const res = await this.vision.images.annotate(
      {
        requestBody: {
          requests: [
            {
              image: { content: imageBuffer.toString("base64") },
              features: [{ type: "DOCUMENT_TEXT_DETECTION" }],
            },
          ],
        },
      },
      { timeout: this.timeoutMs }
    );

    const response = res.data.responses?.[0];
    if (response?.error?.message) {
      throw new Error(`Vision OCR failed: ${response.error.message}`);
    }

    return linesFromAnnotation(response?.fullTextAnnotation);
  }
}

export const createGoogleVisionOcrEngine = (auth: Auth.GoogleAuth, timeoutMs: number): GoogleVisionOcrEngine => {
  const vision = google.vision({ version: "v1", auth });
  return new GoogleVisionOcrEngine(vision, timeoutMs);
};
