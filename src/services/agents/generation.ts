/**
 * Timed calls into the text-generation collaborator
 */

import type { CompletionOptions, TextGenerator } from '../../types/llm.js';
import { DebateCancelledError, GenerationError } from '../../types/errors.js';
import { withTimeout } from '../../utils/async.js';

/**
 * Call the generator with a per-call timeout. On timeout the in-flight call
 * is aborted and a GenerationError of kind 'timeout' is thrown; if the
 * caller's signal aborts, DebateCancelledError is thrown instead.
 */
export async function completeWithTimeout(
  generator: TextGenerator,
  prompt: string,
  options: CompletionOptions & { timeoutMs: number }
): Promise<string> {
  const { signal: parentSignal, ...rest } = options;
  const controller = new AbortController();
  const onParentAbort = () => controller.abort();
  parentSignal?.addEventListener('abort', onParentAbort, { once: true });

  try {
    return await withTimeout(
      generator.complete(prompt, { ...rest, signal: controller.signal }),
      options.timeoutMs,
      () => {
        controller.abort();
        return new GenerationError(`Generation timed out after ${options.timeoutMs}ms`, 'timeout');
      }
    );
  } catch (error) {
    if (parentSignal?.aborted) {
      throw new DebateCancelledError();
    }
    throw GenerationError.fromError(error);
  } finally {
    parentSignal?.removeEventListener('abort', onParentAbort);
  }
}
