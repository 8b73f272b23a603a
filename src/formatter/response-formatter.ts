import { Logger } from "../logger.js";
import type { InvokeOptions, ModelInvoker } from "../drivers/types.js";

export const FORMATTER_INSTRUCTION = `You are a small AI assistant. Your job is to process the raw output returned by external tools and present it to the user in a clear, concise, and user-friendly way.

Rules:
- Always focus on answering the user's original query directly and clearly.
- Summarize or reformat the tool output so it is easy to understand.
- Keep the answer concise and remove irrelevant or redundant details.
- If the tool output contains unrelated information, ignore it unless it directly helps answer the query.
- Use plain text, bullet points, or JSON if structured output is requested.
- Never invent new information; stick strictly to the tool output.
- Ensure tone is factual, neutral, and helpful.`;

/** Prompt handed to the formatting model: the raw output, then the query it answers. */
export function formatterPrompt(rawToolOutput: string, userQuery: string): string {
  return `${rawToolOutput}\n\n User Prompt: ${userQuery}`;
}

/**
 * ResponseFormatter: a second, memoryless pass that rewrites raw tool
 * output for the user. The model's text is returned as-is.
 */
export class ResponseFormatter {
  constructor(
    private readonly invoker: ModelInvoker,
    private readonly sampling: Omit<InvokeOptions, "model"> = {},
  ) {}

  async format(rawToolOutput: string, userQuery: string, model: string): Promise<string> {
    Logger.debug(`formatter: ${rawToolOutput.length} chars via ${model}`);
    return this.invoker.generate(formatterPrompt(rawToolOutput, userQuery), FORMATTER_INSTRUCTION, {
      ...this.sampling,
      model,
    });
  }
}
