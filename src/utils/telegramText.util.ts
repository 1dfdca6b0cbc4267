// Telegram rejects messages longer than this
export const TELEGRAM_MESSAGE_LIMIT = 4096;

/**
 * Escapes the characters legacy Markdown treats as markup (`_`, `*`, `` ` ``, `[`).
 */
export const escapeMarkdown = (text: string): string => {
  return text.replace(/([_*`[])/g, "\\$1");
};

// Never cut between a backslash and the character it escapes
const safeCutIndex = (text: string, limit: number): number => {
  let backslashes = 0;
  while (backslashes < limit && text[limit - 1 - backslashes] === "\\") {
    backslashes++;
  }
  return backslashes % 2 === 1 && limit > 1 ? limit - 1 : limit;
};

/**
 * Splits a reply into chunks Telegram accepts, preferring line boundaries.
 * A single line longer than the limit is cut hard.
 */
export const splitMessage = (text: string, limit: number = TELEGRAM_MESSAGE_LIMIT): string[] => {
  if (text.length <= limit) {
    return [text];
  }

  const chunks: string[] = [];
  let current = "";

  for (const line of text.split("\n")) {
    const candidate = current ? `${current}\n${line}` : line;
    if (candidate.length <= limit) {
      current = candidate;
      continue;
    }

    if (current) {
      chunks.push(current);
    }

    let rest = line;
    while (rest.length > limit) {
      const cut = safeCutIndex(rest, limit);
      chunks.push(rest.slice(0, cut));
      rest = rest.slice(cut);
    }
    current = rest;
  }

  if (current) {
    chunks.push(current);
  }

  return chunks;
};
