/**
 * Command line tokenizer with POSIX shell quoting rules:
 * - unquoted whitespace separates words
 * - '...' is literal
 * - "..." keeps its content, with \\ \" \$ \` escapes
 * - an unquoted backslash escapes the next character
 */

import { CommandParseError } from "../errors";

const DOUBLE_QUOTE_ESCAPABLE = new Set(["\\", '"', "$", "`"]);
const WHITESPACE = /\s/;

type State = "word" | "single" | "double";

export function tokenize(line: string): string[] {
  const tokens: string[] = [];
  let current = "";
  let inToken = false;
  let state: State = "word";

  for (let i = 0; i < line.length; i++) {
    const ch = line[i];

    if (state === "single") {
      if (ch === "'") state = "word";
      else current += ch;
      continue;
    }

    if (state === "double") {
      if (ch === '"') {
        state = "word";
      } else if (ch === "\\") {
        if (i + 1 >= line.length) throw new CommandParseError("no escaped character", line);
        const next = line[++i];
        current += DOUBLE_QUOTE_ESCAPABLE.has(next) ? next : `\\${next}`;
      } else {
        current += ch;
      }
      continue;
    }

    if (WHITESPACE.test(ch)) {
      if (inToken) {
        tokens.push(current);
        current = "";
        inToken = false;
      }
      continue;
    }

    inToken = true;
    if (ch === "'") {
      state = "single";
    } else if (ch === '"') {
      state = "double";
    } else if (ch === "\\") {
      if (i + 1 >= line.length) throw new CommandParseError("no escaped character", line);
      current += line[++i];
    } else {
      current += ch;
    }
  }

  if (state !== "word") {
    throw new CommandParseError("no closing quotation", line);
  }
  if (inToken) tokens.push(current);

  return tokens;
}
