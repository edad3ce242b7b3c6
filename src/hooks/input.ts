/**
 * Hook input acquisition.
 *
 * Codex passes its payload as a single CLI argument; everyone else pipes it
 * on stdin. The argument wins when it looks like a JSON object.
 */

/** Minimal view of stdin so tests can hand in a plain iterable. */
export interface InputStream extends AsyncIterable<string | Uint8Array> {
  isTTY?: boolean;
}

/** True when an argument should be treated as an inline JSON payload. */
export function looksLikeJsonObject(arg: string | undefined): arg is string {
  return arg !== undefined && arg.trim().startsWith('{');
}

/** Read a stream to the end as UTF-8. A TTY yields an empty string. */
export async function readStream(stream: InputStream): Promise<string> {
  if (stream.isTTY) return '';

  const decoder = new TextDecoder();
  let data = '';
  for await (const chunk of stream) {
    data += typeof chunk === 'string' ? chunk : decoder.decode(chunk, { stream: true });
  }
  return data + decoder.decode();
}

/**
 * Resolve the raw payload for this invocation: the first argument when it
 * is an inline JSON object, otherwise everything on stdin.
 */
export async function readHookInput(
  args: readonly string[],
  stdin: InputStream
): Promise<string> {
  const first = args[0];
  if (looksLikeJsonObject(first)) return first;
  return readStream(stdin);
}
