/**
 * Prompt templates for grounded Q&A over financial documents.
 *
 * The system prompt:
 * - Restricts answers to the supplied context
 * - Fixes the inline citation format parsed by `extractInlineCitations`
 * - Gives the exact refusal sentence for missing information
 */

/**
 * Refusal the model is told to use when the context lacks the answer.
 */
export const MODEL_REFUSAL_SENTENCE =
  "I don't have that information in the uploaded documents.";

/**
 * Build the system prompt. The numbered context is embedded here so the
 * user message carries only the question.
 */
export function buildRAGSystemPrompt(context: string): string {
  return `You are a helpful financial advisor for a nonprofit organization.

Your role:
- Answer questions about financial documents using ONLY the provided context
- Be factual and concise, citing specific figures and dates
- Maintain organizational perspective and confidentiality
- Acknowledge data limitations if information is incomplete

Instructions:
1. If the answer is NOT in the provided context, respond: "${MODEL_REFUSAL_SENTENCE}"
2. Always cite sources using the format: [Source: document_name, page X]
3. Be specific with amounts, dates, and percentages from the documents
4. Do not make assumptions or extrapolate beyond provided data
5. If multiple interpretations exist, note the ambiguity

Context from Financial Documents:
${context}`;
}

/**
 * Build the user prompt for a question.
 */
export function buildRAGUserPrompt(question: string): string {
  return `Question: ${question}

Answer based ONLY on the provided context above. Be concise and cite sources.`;
}
