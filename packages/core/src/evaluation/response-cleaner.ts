const UNKNOWN_ANSWER = 'unknown';
const MAX_ANSWER_WORDS = 3;
const LEADING_PHRASES = [/^the answer is\s*/, /^answer:\s*/, /^(?:the|a|an)\s+/];
const TIME_PREPOSITION = /\b(?:in|during|on)\b/;
const YEAR = /\b(?:19|20)\d{2}\b/;

/**
 * Reduces a free-text model reply to a short answer: lower-cased, lead-in
 * phrases dropped, first line and sentence kept, at most three words.
 */
export function cleanResponse(response: string): string {
  let text = response.trim().toLowerCase();

  for (const phrase of LEADING_PHRASES) {
    text = text.replace(phrase, '').trim();
  }

  text = text.split('\n')[0].trim();
  text = text.split('.')[0].trim();

  if (TIME_PREPOSITION.test(text)) {
    const year = YEAR.exec(text);
    if (year) {
      return year[0];
    }
  }

  const words = text.split(/\s+/).filter((word) => word.length > 0);
  const answer = words.slice(0, MAX_ANSWER_WORDS).join(' ');
  return answer === '' ? UNKNOWN_ANSWER : answer;
}
