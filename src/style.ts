/**
 * Cell style codec.
 *
 * Draw.io stores a cell's style as one flat attribute string of the form
 * `key=value;flag;key=value;`. Neither `=` nor `;` is escaped by the editor,
 * so a key or value containing either character will not survive a
 * decode/encode cycle.
 */

/** Flat key/value style bag. An empty value marks a flag-only property. */
export type Style = Record<string, string>;

/**
 * Encode a style as `key=value;` / `key;` pairs. Entry order follows the
 * object's own enumeration order and carries no meaning.
 */
export function encodeStyle(style: Style): string {
  let text = "";
  for (const [key, value] of Object.entries(style)) {
    text += key;
    if (value !== "") {
      text += `=${value}`;
    }
    text += ";";
  }
  return text;
}

/**
 * Decode a style attribute string. Never fails: a fragment without `=` is a
 * flag with an empty value, and the empty fragment after a trailing `;`
 * becomes an entry with an empty key.
 */
export function decodeStyle(text: string): Style {
  // fromEntries defines own properties, so a `__proto__` key is kept as data.
  const entries = text.split(";").map((pair): [string, string] => {
    const eq = pair.indexOf("=");
    return eq === -1 ? [pair, ""] : [pair.slice(0, eq), pair.slice(eq + 1)];
  });
  return Object.fromEntries(entries);
}

/** Return a new style with `overrides` applied on top of `base`. */
export function mergeStyle(base: Style, overrides: Style): Style {
  return { ...base, ...overrides };
}

/** Copy of `style` without the empty-key entry a trailing `;` decodes to. */
export function stripEmptyKey(style: Style): Style {
  const copy = { ...style };
  delete copy[""];
  return copy;
}
