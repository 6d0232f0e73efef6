/**
 * Response Formatter - user-facing wording for failures
 *
 * Technical detail goes to the log only, never into the spoken reply.
 */

export const FALLBACK_REPLY = "I'm not sure how to respond to that."
export const OUTPUT_FAILURE_REPLY = 'I encountered an error while processing your request.'

export function formatErrorMessage(userMessage: string): string {
  return `Sorry, I encountered an issue: ${userMessage}`
}
