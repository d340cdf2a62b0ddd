/**
 * Sample credentials that appear in docs and env templates. A token equal to
 * one of these (case-insensitive) is rejected at construction.
 */
export const PLACEHOLDER_TOKENS: ReadonlyArray<string> = [
  'REPLACE_ME',
  'CHANGE_ME',
  'YOUR_TOKEN',
  'YOUR_TOKEN_HERE',
  'YOUR_API_KEY',
  '<token>',
  '<your-token>',
  'sk-...',
];

export function isPlaceholderToken(token: string): boolean {
  const normalized = token.trim().toLowerCase();
  return PLACEHOLDER_TOKENS.some((placeholder) => placeholder.toLowerCase() === normalized);
}
