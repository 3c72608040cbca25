/**
 * Split a line into words with POSIX shell quoting, so a pattern such
 * as `"^user data"` survives as one word.
 *
 * - Whitespace separates words.
 * - Single quotes preserve everything up to the next single quote.
 * - Double quotes preserve everything except `\"` and `\\`.
 * - Outside quotes, a backslash escapes the next character.
 *
 * @throws {Error} on an unclosed quote or a trailing backslash
 */
export function splitShellWords(line: string): string[] {
  const words: string[] = [];
  let word = "";
  let inWord = false;
  let quote: "'" | '"' | null = null;

  for (let i = 0; i < line.length; i++) {
    const ch = line.charAt(i);

    if (quote === "'") {
      if (ch === "'") quote = null;
      else word += ch;
      continue;
    }

    if (quote === '"') {
      if (ch === '"') {
        quote = null;
      } else if (ch === "\\" && (line[i + 1] === '"' || line[i + 1] === "\\")) {
        word += line.charAt(++i);
      } else {
        word += ch;
      }
      continue;
    }

    if (/\s/.test(ch)) {
      if (inWord) {
        words.push(word);
        word = "";
        inWord = false;
      }
      continue;
    }

    inWord = true;
    if (ch === "'" || ch === '"') {
      quote = ch;
    } else if (ch === "\\") {
      if (i + 1 >= line.length) throw new Error("No escaped character");
      word += line.charAt(++i);
    } else {
      word += ch;
    }
  }

  if (quote !== null) throw new Error("No closing quotation");
  if (inWord) words.push(word);
  return words;
}
