// src/core/eval/regex.ts
// Regex primitives over the ECMAScript pattern subset.
// Replacement text is literal; split drops capture groups and empty matches.

import { REGEX_FLAGS } from "../constants";
import { expectInt, expectStr } from "./builtins";
import { CoreILRuntimeError } from "./errors";
import { mkArray, mkBool, mkStr, type Val } from "./values";

export function regexFlags(flags: Val | undefined): string {
  if (flags === undefined || flags.tag === "Null") return "";
  const text = expectStr(flags, "regex flags");
  let out = "";
  for (const ch of text) {
    if (!REGEX_FLAGS.some(f => f === ch)) {
      throw new CoreILRuntimeError(`unknown regex flag '${ch}'`);
    }
    if (!out.includes(ch)) out += ch;
  }
  return out;
}

function compile(pattern: Val, flags: Val | undefined, global: boolean): RegExp {
  const source = expectStr(pattern, "regex pattern");
  try {
    return new RegExp(source, regexFlags(flags) + (global ? "g" : ""));
  } catch (e) {
    if (e instanceof SyntaxError) throw new CoreILRuntimeError(`invalid regex: ${source}`);
    throw e;
  }
}

/** Every non-overlapping match; empty matches advance by one position. */
function matches(re: RegExp, s: string): RegExpExecArray[] {
  const out: RegExpExecArray[] = [];
  re.lastIndex = 0;
  for (let m = re.exec(s); m !== null; m = re.exec(s)) {
    out.push(m);
    if (m[0] === "") re.lastIndex++;
  }
  return out;
}

export function regexMatch(string: Val, pattern: Val, flags?: Val): Val {
  return mkBool(compile(pattern, flags, false).test(expectStr(string, "regex subject")));
}

export function regexFindAll(string: Val, pattern: Val, flags?: Val): Val {
  const s = expectStr(string, "regex subject");
  return mkArray(matches(compile(pattern, flags, true), s).map(m => mkStr(m[0])));
}

export function regexReplace(string: Val, pattern: Val, replacement: Val, flags?: Val): Val {
  const s = expectStr(string, "regex subject");
  const r = expectStr(replacement, "regex replacement");
  return mkStr(s.replace(compile(pattern, flags, true), () => r));
}

export function regexSplit(string: Val, pattern: Val, flags?: Val, maxsplit?: Val): Val {
  const s = expectStr(string, "regex subject");
  const limit = maxsplit === undefined || maxsplit.tag === "Null" ? 0 : Number(expectInt(maxsplit, "maxsplit"));
  if (limit < 0) return mkArray([mkStr(s)]);
  const pieces: Val[] = [];
  let last = 0;
  for (const m of matches(compile(pattern, flags, true), s)) {
    if (m[0] === "") continue;
    if (limit > 0 && pieces.length >= limit) break;
    pieces.push(mkStr(s.slice(last, m.index)));
    last = m.index + m[0].length;
  }
  pieces.push(mkStr(s.slice(last)));
  return mkArray(pieces);
}
