export const FACT_CHECK_SYSTEM_PROMPT = 'You are a fact-checker and verifier.';

/** User prompt asking a judge to grade `response` as an answer to `query`. */
export function buildFactCheckPrompt(query: string, response: string): string {
  return `Verify the following response to the query.

Query: ${query}
Response to verify: ${response}

Please:
1. Check if the response is factually correct
2. Check if it addresses the query properly
3. Identify any errors or misleading information
4. Provide brief feedback

Reply with a single JSON object and nothing else:
{
  "verified": true or false,
  "confidence": number between 0.0 and 1.0,
  "feedback": "brief feedback",
  "corrections": ["list any corrections needed"]
}`;
}
