/**
 * Word scanning over a stream of text chunks.
 *
 * A word is a maximal run of non-whitespace characters. Whitespace is
 * ASCII space, \t \n \v \f \r, NEL, NBSP and the Unicode space, line and
 * paragraph separators.
 *
 * Dependencies: none.
 */

/** Whether a UTF-16 code unit is a whitespace separator */
export function isSpace(code: number): boolean {
  if (code <= 0xff) {
    return code === 0x20 || (code >= 0x09 && code <= 0x0d) || code === 0x85 ||
      code === 0xa0;
  }
  // Every other separator lives in the BMP, so surrogates never match.
  return code === 0x1680 ||
    (code >= 0x2000 && code <= 0x200a) ||
    code === 0x2028 ||
    code === 0x2029 ||
    code === 0x202f ||
    code === 0x205f ||
    code === 0x3000;
}

/**
 * Lazily yield the words of a chunked text stream.
 *
 * Single pass: the source is consumed as the generator advances. A word
 * split across chunk boundaries is yielded once, whole.
 */
export async function* scanWords(
  chunks: AsyncIterable<string>,
): AsyncGenerator<string, void, undefined> {
  let pending = "";

  for await (const chunk of chunks) {
    let start = -1;
    for (let i = 0; i < chunk.length; i++) {
      if (isSpace(chunk.charCodeAt(i))) {
        if (start >= 0) {
          yield pending + chunk.slice(start, i);
          pending = "";
          start = -1;
        } else if (pending !== "") {
          yield pending;
          pending = "";
        }
      } else if (start < 0) {
        start = i;
      }
    }
    if (start >= 0) {
      pending += chunk.slice(start);
    }
  }

  if (pending !== "") {
    yield pending;
  }
}

/** Count the words of a chunked text stream */
export async function countWords(
  chunks: AsyncIterable<string>,
): Promise<number> {
  let count = 0;
  for await (const _word of scanWords(chunks)) {
    count++;
  }
  return count;
}
