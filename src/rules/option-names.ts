import type { EvaluatedOption } from "../types.js";

function normalize(text: string): string {
  return text
    .toLowerCase()
    .replace(/[^\p{L}\p{N}]+/gu, " ")
    .trim();
}

function containsWords(haystack: string, needle: string): boolean {
  return needle.length > 0 && ` ${haystack} `.includes(` ${needle} `);
}

/**
 * True when a matrix column label names the option: by id ("Option 2", "2"),
 * or by name, either one containing the other as whole words.
 */
export function labelMatchesOption(label: string, option: EvaluatedOption): boolean {
  const l = normalize(label);
  if (!l) return false;
  if (option.id) {
    const id = normalize(option.id);
    if (l === id || l === `option ${id}`) return true;
  }
  const name = normalize(option.name);
  return containsWords(name, l) || containsWords(l, name);
}

/**
 * True when free text mentions the option by name or as "Option <id>".
 */
export function textMentionsOption(text: string, option: EvaluatedOption): boolean {
  const t = normalize(text);
  if (option.id && containsWords(t, `option ${normalize(option.id)}`)) return true;
  return containsWords(t, normalize(option.name));
}
