// src/services/ocrService.ts
import { createWorker } from "tesseract.js";
import { OcrFailureError, errorMessage } from "../lib/errors";
import type { Logger } from "../lib/logger";

/** image bytes -> raw text; may return empty or garbled text. Stops work once `signal` aborts. */
export interface OcrEngine {
  recognize(image: Buffer, signal?: AbortSignal): Promise<string>;
}

export class TesseractOcrEngine implements OcrEngine {
  constructor(
    private readonly opts: { lang: string; langPath?: string; logger?: Logger }
  ) {}

  async recognize(image: Buffer, signal?: AbortSignal): Promise<string> {
    const { lang, langPath, logger } = this.opts;
    // One worker per flyer keeps concurrent uploads independent
    const worker = await createWorker(lang, undefined, langPath ? { langPath } : {});

    let stopped: Promise<unknown> | undefined;
    const stop = () => (stopped ??= worker.terminate());
    const onAbort = () => {
      logger?.warn("ocr aborted, terminating worker");
      stop().catch((err: unknown) => logger?.error({ err }, "ocr worker did not terminate"));
    };
    if (signal?.aborted) onAbort();
    else signal?.addEventListener("abort", onAbort, { once: true });

    try {
      signal?.throwIfAborted();
      const started = Date.now();
      const result = await worker.recognize(image);
      logger?.debug({ ms: Date.now() - started, chars: result.data.text.length }, "ocr finished");
      return result.data.text;
    } finally {
      signal?.removeEventListener("abort", onAbort);
      await stop();
    }
  }
}

/**
 * Runs OCR under a time budget and aborts the engine when it runs out.
 * Timeouts and engine errors surface as OcrFailureError; nothing is retried here.
 */
export async function recognizeWithTimeout(engine: OcrEngine, image: Buffer, timeoutMs: number): Promise<string> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const err = new OcrFailureError("timeout", `OCR timed out after ${timeoutMs}ms`);
      controller.abort(err);
      reject(err);
    }, timeoutMs);
  });
  try {
    return await Promise.race([engine.recognize(image, controller.signal), timeout]);
  } catch (err) {
    if (err instanceof OcrFailureError) throw err;
    throw new OcrFailureError("engine", `OCR failed: ${errorMessage(err)}`, { cause: err });
  } finally {
    clearTimeout(timer);
  }
}
