import { SynthesisError } from "./errors";
import type { TextGenerator } from "./generator";

/**
 * Answer prompt. Exactly two slots: {context} and {question}. The grounding
 * rules live here, in the prompt, not in code.
 */
export const ANSWER_PROMPT_TEMPLATE = `You are an expert assistant analyzing a single source document.
Use the following excerpt from the document to answer the question. Be precise and stay true to the author's ideas.

EXCERPT FROM DOCUMENT:
{context}

QUESTION: {question}

INSTRUCTIONS:
1. Answer based ONLY on the provided excerpt
2. If the excerpt doesn't contain relevant information, say so
3. Be concise and accurate

ANSWER:`;

export interface PromptSlots {
  context: string;
  question: string;
}

/**
 * Substitute the two slots in one pass, so slot-like text inside the values
 * is left as is.
 */
export function renderPrompt(template: string, slots: PromptSlots): string {
  return template.replace(/\{(context|question)\}/g, (_m, name: keyof PromptSlots) => slots[name]);
}

/** Renders the answer prompt and calls the generative model. */
export class AnswerSynthesizer {
  public constructor(
    private readonly generator: TextGenerator,
    private readonly template: string = ANSWER_PROMPT_TEMPLATE,
  ) {}

  /** Build the exact prompt that {@link synthesize} sends. */
  public buildPrompt(question: string, context: readonly string[]): string {
    return renderPrompt(this.template, { context: context.join("\n\n"), question });
  }

  /**
   * @param context Retrieved chunk texts, most relevant first.
   * @throws {SynthesisError} When the model call fails or times out.
   */
  public async synthesize(question: string, context: readonly string[]): Promise<string> {
    const prompt = this.buildPrompt(question, context);
    try {
      const text = await this.generator.generate(prompt);
      return text.trim();
    } catch (e) {
      throw new SynthesisError(`Answer generation with '${this.generator.modelName}' failed`, { cause: e });
    }
  }
}
