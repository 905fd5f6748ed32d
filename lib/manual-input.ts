import { createInterface } from 'node:readline/promises';
import type { ManualInputConfig } from './config';
import type { Decimal } from './math';
import { InteractiveInputRequiredError, rejectManualInput, type ManualInputProvider } from './modeling';

/**
 * Asks on the terminal. The answer is returned as typed; an empty answer
 * ("skip") fails numeric validation downstream. Input that ends before an
 * answer raises InteractiveInputRequiredError.
 */
export function createConsolePrompt(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout
): (prompt: string) => Promise<string> {
  return async (prompt) => {
    const rl = createInterface({ input, output });
    let closed = false;
    const endOfInput = new Promise<never>((_, reject) => {
      rl.once('close', () => {
        closed = true;
        reject(new InteractiveInputRequiredError(prompt, 'EBIT'));
      });
    });

    try {
      const answer = await Promise.race([rl.question(prompt), endOfInput]);
      return answer.trim();
    } catch (error) {
      // Input ended before an answer arrived.
      if (closed) {
        throw new InteractiveInputRequiredError(prompt, 'EBIT');
      }
      throw error;
    } finally {
      rl.close();
    }
  };
}

export function fixedManualInput(value: Decimal.Value): ManualInputProvider {
  return () => value;
}

/**
 * Injected value > no prompting > terminal prompt.
 */
export function resolveManualInput(
  config: ManualInputConfig,
  prompt: () => ManualInputProvider = createConsolePrompt
): ManualInputProvider {
  const { manualEbit } = config;
  if (manualEbit !== undefined) {
    return (promptText) => {
      console.log(`[ManualInput] ${promptText.trim()} ${manualEbit} (DCF_MANUAL_EBIT)`);
      return manualEbit;
    };
  }
  if (config.nonInteractive) {
    return rejectManualInput;
  }
  return prompt();
}
