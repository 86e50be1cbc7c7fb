/**
 * Best-effort scrubbing of names and email addresses from free text before
 * it is forwarded to the assistants API. Heuristic only: two or more
 * consecutive capitalised words are treated as a name.
 */

export const EMAIL_TOKEN = '[EMAIL]';
export const NAME_TOKEN = '[NAME]';

const EMAIL = /[a-zA-Z0-9._%+\-]+@[a-zA-Z0-9.\-]+\.[a-zA-Z]{2,}/g;
// Letter-aware edges: \b only knows ASCII word characters.
const CAPITALISED_RUN =
  /(?<![\p{L}\p{N}_])\p{Lu}\p{Ll}+(?:[ \t]+\p{Lu}\p{Ll}+)+(?![\p{L}\p{N}_])/gu;

export function redactPii(input: string): string {
  return input.replace(EMAIL, EMAIL_TOKEN).replace(CAPITALISED_RUN, NAME_TOKEN);
}
