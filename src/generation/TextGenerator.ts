/**
 * Text generation capability used by every LLM-backed component.
 *
 * Implementations may return an empty string or throw. Nothing guarantees that
 * the output follows the shape a prompt asked for, so callers parse defensively.
 */
export interface TextGenerator {
  generate(prompt: string, systemMessage: string): Promise<string>;
}
