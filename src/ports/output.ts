/**
 * Output port interface.
 * Where `%dump` writes its listing.
 */
export interface OutputPort {
  write(text: string): void;
}

export const stdoutPort: OutputPort = {
  write(text) {
    process.stdout.write(text);
  },
};

export function memoryOutputPort(): OutputPort & { text(): string } {
  const parts: string[] = [];
  return {
    write(text) {
      parts.push(text);
    },
    text() {
      return parts.join("");
    },
  };
}
