import type {
  GeneratedImage,
  GenerationRequest,
  ImageGenerator,
  ImageProcessor,
  Dimensions,
} from "@slidesmith/assets";
import { TINY_PNG } from "./images";

export interface FakeImageGeneratorOptions {
  /**
   * Error to throw for a request; return undefined to succeed.
   * Receives the 1-based call number for that prompt.
   */
  fail?: ((request: GenerationRequest, attempt: number) => Error | undefined) | undefined;
  /** Defaults to inline TINY_PNG bytes */
  image?: ((request: GenerationRequest) => GeneratedImage) | undefined;
  /** Delay before answering, in milliseconds */
  delayMs?: number | undefined;
}

/**
 * In-process image generator that records every request
 *
 * @example
 * ```ts
 * const generator = new FakeImageGenerator({
 *   fail: (request) =>
 *     request.prompt.includes("Outro") ? new GenerationError("refused") : undefined,
 * });
 * ```
 */
export class FakeImageGenerator implements ImageGenerator {
  public readonly calls: GenerationRequest[] = [];
  public maxInFlight = 0;
  private inFlight = 0;

  constructor(private readonly options: FakeImageGeneratorOptions = {}) {}

  public async generate(
    request: GenerationRequest,
    signal?: AbortSignal,
  ): Promise<GeneratedImage> {
    this.calls.push(request);
    this.inFlight += 1;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    try {
      if (this.options.delayMs !== undefined) {
        await new Promise((resolve) => setTimeout(resolve, this.options.delayMs));
      }
      signal?.throwIfAborted();

      const attempt = this.callsFor(request.prompt);
      const error = this.options.fail?.(request, attempt);
      if (error) throw error;

      return this.options.image?.(request) ?? { kind: "bytes", data: TINY_PNG };
    } finally {
      this.inFlight -= 1;
    }
  }

  public callsFor(promptFragment: string): number {
    return this.calls.filter((call) => call.prompt.includes(promptFragment)).length;
  }
}

/**
 * Processor that skips decoding and writes the target size as text,
 * e.g. "1920x1080"
 */
export class FakeImageProcessor implements ImageProcessor {
  public readonly calls: Array<{ data: Uint8Array; size: Dimensions }> = [];

  public async normalize(data: Uint8Array, size: Dimensions): Promise<Uint8Array> {
    this.calls.push({ data, size });
    return new TextEncoder().encode(`${size.width}x${size.height}`);
  }
}
