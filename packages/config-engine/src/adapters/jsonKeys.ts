/**
 * `JSON.parse` keeps the last of two members with the same name. Config files
 * are rejected instead, so valid JSON is scanned once more for repeats.
 */

function stringEnd(text: string, start: number): number {
  let index = start + 1;
  while (index < text.length) {
    const char = text[index];
    if (char === '\\') {
      index += 2;
      continue;
    }
    if (char === '"') {
      return index;
    }
    index++;
  }
  return text.length - 1;
}

/**
 * Returns the first member name repeated within one object, or null.
 * Expects text that `JSON.parse` already accepted.
 */
export function findDuplicateJsonKey(text: string): string | null {
  // one entry per open container: a key set for objects, null for arrays
  const scopes: Array<Set<string> | null> = [];
  let expectKey = false;
  let index = 0;

  while (index < text.length) {
    const char = text[index];

    if (char === '"') {
      const end = stringEnd(text, index);
      const keys = scopes[scopes.length - 1];
      if (keys && expectKey) {
        const key: unknown = JSON.parse(text.slice(index, end + 1));
        if (typeof key === 'string') {
          if (keys.has(key)) {
            return key;
          }
          keys.add(key);
        }
        expectKey = false;
      }
      index = end + 1;
      continue;
    }

    if (char === '{') {
      scopes.push(new Set());
      expectKey = true;
    } else if (char === '[') {
      scopes.push(null);
    } else if (char === '}' || char === ']') {
      scopes.pop();
    } else if (char === ',') {
      expectKey = scopes[scopes.length - 1] instanceof Set;
    }
    index++;
  }

  return null;
}
