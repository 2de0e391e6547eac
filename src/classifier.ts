import { matchKeywords } from "./keywords.js";
import { Classification, Snapshot, Target } from "./types.js";

/**
 * Decides the status of a successfully fetched target and whether its
 * snapshot must be rewritten. Equality is checked before any keyword scan,
 * so an unchanged page never causes a write.
 */
export function classify(target: Target, text: string, prior: Snapshot | null): Classification {
  const { url } = target;

  if (!prior) {
    return { result: { url, status: "initialized" }, action: { kind: "write", text } };
  }

  if (text === prior.text) {
    return { result: { url, status: "no-change" }, action: { kind: "none" } };
  }

  const matched = matchKeywords(text, target.keywords);
  if (matched.length > 0) {
    return {
      result: { url, status: "keyword-change", matched_keywords: matched },
      action: { kind: "write", text },
    };
  }
  return { result: { url, status: "changed-but-no-keywords" }, action: { kind: "write", text } };
}
