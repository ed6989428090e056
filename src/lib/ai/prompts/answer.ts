/**
 * Prompt for grounded question answering over retrieved chunks.
 */

export const ANSWER_SYSTEM_PROMPT = `You answer questions about a collection of scholarly documents.

Use ONLY the numbered context passages supplied with the question. Every sentence that
uses information from a passage must cite it with its number in square brackets, for
example [1] or [2][3]. Never cite a number that is not in the context.

If the passages do not contain the answer, say so plainly instead of guessing.
Answer in the language of the question. Be concise: a few short paragraphs at most.`;

export interface ContextPassage {
  marker: number;
  citation: string;
  page: number | null;
  text: string;
}

export function buildAnswerPrompt(question: string, passages: ContextPassage[]): string {
  const context = passages
    .map((p) => {
      const location = p.page !== null ? `, page ${p.page}` : '';
      return `[${p.marker}] ${p.citation}${location}\n${p.text}`;
    })
    .join('\n\n');

  return `## Context passages\n\n${context}\n\n## Question\n\n${question}`;
}
