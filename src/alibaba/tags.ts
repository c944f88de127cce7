import { ValidationError } from "../errors.js";

/**
 * Parse an Alibaba Cloud resource tag string into a map.
 *
 * Accepts both `key:Env value:Prod; key:Role value:App` and the variant with
 * a trailing `;`. Separator spacing is normalized first.
 */
export function parseAlibabaTag(tag: string | null | undefined): Record<string, string> {
  if (!tag || !tag.trim()) return {};

  const normalized = tag.trim().replaceAll("; ", ";").replaceAll(";", "; ").replace(/[; ]+$/, "");

  const result: Record<string, string> = {};
  for (const pair of normalized.split("; ")) {
    if (!pair.trim()) continue;

    const at = pair.indexOf("value:");
    if (at === -1) {
      throw new ValidationError(`Invalid tag pair, missing 'value:': ${pair}`, { provider: "alibaba" });
    }
    const key = pair.slice(0, at).replaceAll("key:", "").trim();
    if (!key) {
      throw new ValidationError(`Empty key in tag pair: ${pair}`, { provider: "alibaba" });
    }
    result[key] = pair.slice(at + "value:".length).trim();
  }

  return result;
}
