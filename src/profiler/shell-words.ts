import { ValidationError } from "../errors";

/**
 * Split a parameter string into words the way a POSIX shell would
 *
 * Handles single quotes, double quotes and backslash escapes; no expansion.
 *
 * @throws {ValidationError} On an unterminated quote
 *
 * @example
 * ```typescript
 * splitShellWords("r 0.5 'a b'"); // ["r", "0.5", "a b"]
 * ```
 */
export function splitShellWords(input: string): string[] {
  const words: string[] = [];
  let current = "";
  let inWord = false;
  let quote: "'" | '"' | undefined;

  for (let i = 0; i < input.length; i++) {
    const char = input.charAt(i);

    if (quote === "'") {
      if (char === "'") quote = undefined;
      else current += char;
      continue;
    }

    if (quote === '"') {
      if (char === '"') {
        quote = undefined;
      } else if (char === "\\" && /["\\$`]/.test(input.charAt(i + 1))) {
        current += input.charAt(++i);
      } else {
        current += char;
      }
      continue;
    }

    if (char === " " || char === "\t" || char === "\n") {
      if (inWord) {
        words.push(current);
        current = "";
        inWord = false;
      }
      continue;
    }

    inWord = true;
    if (char === "'" || char === '"') {
      quote = char;
    } else if (char === "\\" && i + 1 < input.length) {
      current += input.charAt(++i);
    } else {
      current += char;
    }
  }

  if (quote !== undefined) {
    throw new ValidationError(`Unterminated ${quote} quote in '${input}'`);
  }
  if (inWord) words.push(current);
  return words;
}
