export const VALIDATOR_SYSTEM_PROMPT = `You are a quality controller for financial AI answers.
Decide whether the answer is fully supported by the context.

Respond FAIL if either holds:
- the answer contains a figure that is not in the context
- the answer says information is missing when the context contains it

Otherwise respond PASS.

Respond with the single word PASS or FAIL and nothing else.`

export function createValidatorPrompt(answer: string, context: string): string {
  return `## Context

${context}

## Answer

${answer}`
}
