/**
 * Newline-delimited JSON framing for the control socket.
 */

export const encodeLine = (value: unknown): string => `${JSON.stringify(value)}\n`;

export interface NdjsonParser {
  push(chunk: string): void;
  flush(): void;
}

export const createNdjsonParser = (
  onObject: (obj: unknown) => void,
  onMalformed?: (line: string) => void,
): NdjsonParser => {
  let buffer = '';

  const emit = (line: string) => {
    const trimmed = line.trim();
    if (!trimmed) return;
    let parsed: unknown;
    try {
      parsed = JSON.parse(trimmed);
    } catch {
      onMalformed?.(trimmed);
      return;
    }
    onObject(parsed);
  };

  return {
    push(chunk: string) {
      buffer += chunk;
      for (;;) {
        const idx = buffer.indexOf('\n');
        if (idx === -1) break;
        const line = buffer.slice(0, idx);
        buffer = buffer.slice(idx + 1);
        emit(line);
      }
    },
    flush() {
      const rest = buffer;
      buffer = '';
      emit(rest);
    },
  };
};
