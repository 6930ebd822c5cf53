import type { BinaryImage, TextWord } from "../assembler/Assembler";

/**
 * Reads an instruction-memory hex file: one 32-bit word per line, optionally
 * `0x`-prefixed. Blank lines and `//` comments are skipped. Words are placed at
 * consecutive addresses from `base`, which is also the entry point.
 */
export function parseHexImage(text: string, base = 0): BinaryImage {
  const origin = base >>> 0;
  if (origin % 4 !== 0) {
    throw new RangeError(`Image base must be word aligned (got 0x${origin.toString(16)})`);
  }

  const words: TextWord[] = [];
  text.split(/\r?\n/).forEach((rawLine, index) => {
    const commentStart = rawLine.indexOf("//");
    const line = (commentStart === -1 ? rawLine : rawLine.slice(0, commentStart)).trim().replace(/_/g, "");
    if (line.length === 0) return;

    const digits = line.replace(/^0[xX]/, "");
    if (!/^[0-9A-Fa-f]{1,8}$/.test(digits)) {
      throw new Error(`Invalid hex word '${rawLine.trim()}' at line ${index + 1}`);
    }

    words.push({ address: (origin + words.length * 4) >>> 0, word: parseInt(digits, 16) >>> 0, line: index + 1 });
  });

  return { entryPoint: origin, text: words, data: [], symbols: {} };
}
