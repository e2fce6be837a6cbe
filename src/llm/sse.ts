const DATA_PREFIX = "data: ";

/** Split a byte stream into text lines (without the trailing \n or \r\n). */
export async function* readLines(body: ReadableStream<Uint8Array>): AsyncGenerator<string> {
  const reader = body.getReader();
  const decoder = new TextDecoder();
  let buffer = "";
  let finished = false;
  let failed = false;
  try {
    while (true) {
      const { done, value } = await reader.read();
      if (done) break;
      buffer += decoder.decode(value, { stream: true });
      let newline = buffer.indexOf("\n");
      while (newline !== -1) {
        yield buffer.slice(0, newline).replace(/\r$/, "");
        buffer = buffer.slice(newline + 1);
        newline = buffer.indexOf("\n");
      }
    }
    buffer += decoder.decode();
    if (buffer) yield buffer.replace(/\r$/, "");
    finished = true;
  } catch (err) {
    failed = true;
    throw err;
  } finally {
    // consumer stopped early: release the upstream connection
    if (!finished && !failed) await reader.cancel();
    reader.releaseLock();
  }
}

export function isDataLine(line: string): boolean {
  return line.startsWith(DATA_PREFIX);
}

/** Relay `data: ` lines unmodified, each terminated by the blank-line separator. */
export async function* relayDataFrames(lines: AsyncIterable<string>): AsyncGenerator<string> {
  for await (const line of lines) {
    if (isDataLine(line)) yield `${line}\n\n`;
  }
}

export function errorFrame(message: string): string {
  return `${DATA_PREFIX}${JSON.stringify({ error: message })}\n\n`;
}
