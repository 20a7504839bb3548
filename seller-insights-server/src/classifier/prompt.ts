export const METRICS_VS_OTHER_SYSTEM =
  "You route questions from Amazon sellers. Reply with a single category name and nothing else.";

export function buildMetricsVsOtherPrompt(question: string): string {
  return `Classify this question into ONE category.

1. metrics_query: asks for business data, metrics or performance numbers from the seller's Amazon account.
   Examples: "What's my ACOS?", "What is ROI?", "Show me total sales", "How are my sales doing today?", "What's the conversion rate?"

2. other_query: greetings, small talk, questions about the assistant, or EXPLICIT requests for a definition or explanation.
   Examples: "Hi", "Who are you?", "What can you do for me?", "What does ACOS mean?", "Explain ACOS to me", "Define conversion rate", "How does Amazon FBA work?"

Rules:
- "What is [anything]?" is metrics_query unless the question explicitly asks for a meaning, definition or explanation.
- Only choose other_query when the question uses words like "mean", "meaning", "explain", "define", "definition", or is clearly not about the seller's data.
- When uncertain, choose metrics_query.

Question: ${question}

Reply with only: metrics_query or other_query`;
}
