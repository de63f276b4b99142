import { experimental_generateImage as generateImage, APICallError } from "ai";
import { createOpenAI } from "@ai-sdk/openai";
import { getErrorMessage } from "@slidesmith/utils";
import type { Logger } from "@slidesmith/utils";
import { GenerationError, TransientIOError, isTransientError } from "../errors";
import type {
  GeneratedImage,
  GenerationRequest,
  ImageGenerator,
} from "../types";

export interface OpenAIImageGeneratorConfig {
  apiKey: string;
  baseURL?: string | undefined;
}

/**
 * Image generator backed by the OpenAI images API
 */
export class OpenAIImageGenerator implements ImageGenerator {
  private readonly provider: ReturnType<typeof createOpenAI>;
  private readonly logger: Logger;

  constructor(config: OpenAIImageGeneratorConfig, logger: Logger) {
    this.provider = createOpenAI({
      apiKey: config.apiKey,
      ...(config.baseURL ? { baseURL: config.baseURL } : {}),
    });
    this.logger = logger.child("OpenAIImageGenerator");
  }

  public async generate(
    request: GenerationRequest,
    signal?: AbortSignal,
  ): Promise<GeneratedImage> {
    this.logger.debug("Generating image", {
      model: request.model,
      size: request.size,
      promptLength: request.prompt.length,
    });

    try {
      const result = await generateImage({
        model: this.provider.image(request.model),
        prompt: request.prompt,
        size: request.size,
        n: 1,
        // retries are owned by the materializer
        maxRetries: 0,
        ...(signal ? { abortSignal: signal } : {}),
      });
      return { kind: "bytes", data: result.image.uint8Array };
    } catch (error) {
      if (signal?.aborted) throw error;
      throw classifyGenerationError(error, request);
    }
  }
}

/**
 * Map provider errors onto the transient/permanent split
 */
export function classifyGenerationError(
  error: unknown,
  request: GenerationRequest,
): Error {
  const message = `Image generation failed: ${getErrorMessage(error)}`;
  const context = { model: request.model, size: request.size };

  if (APICallError.isInstance(error)) {
    const withStatus = { ...context, status: error.statusCode };
    return error.isRetryable
      ? new TransientIOError(message, withStatus)
      : new GenerationError(message, withStatus);
  }
  if (isTransientError(error)) {
    return new TransientIOError(message, context);
  }
  return new GenerationError(message, context);
}
