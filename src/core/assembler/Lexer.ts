export type TokenType = "identifier" | "directive" | "number" | "comma" | "colon" | "lparen" | "rparen";

export interface Token {
  type: TokenType;
  value: string | number;
  line: number;
  column: number;
  raw: string;
}

export interface LexedLine {
  line: number;
  tokens: Token[];
}

const PUNCTUATION: Record<string, TokenType | undefined> = {
  ",": "comma",
  ":": "colon",
  "(": "lparen",
  ")": "rparen",
};

export class Lexer {
  tokenize(source: string): LexedLine[] {
    const lines = source.split(/\r?\n/);
    const lexed: LexedLine[] = [];

    lines.forEach((text, index) => {
      const lineNumber = index + 1;
      const tokens = this.tokenizeLine(text, lineNumber);
      if (tokens.length > 0) {
        lexed.push({ line: lineNumber, tokens });
      }
    });

    return lexed;
  }

  private tokenizeLine(text: string, lineNumber: number): Token[] {
    const cleaned = this.stripComment(text);
    const tokens: Token[] = [];

    let i = 0;
    while (i < cleaned.length) {
      const char = cleaned[i];
      if (/\s/.test(char)) {
        i++;
        continue;
      }

      const column = i + 1;

      const punctuation = PUNCTUATION[char];
      if (punctuation) {
        tokens.push({ type: punctuation, value: char, line: lineNumber, column, raw: char });
        i++;
        continue;
      }

      if (char === ".") {
        const { token, length } = this.readWordToken("directive", cleaned, i + 1, lineNumber, column);
        tokens.push(token);
        i += length + 1;
        continue;
      }

      if (/[0-9+-]/.test(char)) {
        const { token, length } = this.readNumber(cleaned, i, lineNumber, column);
        tokens.push(token);
        i += length;
        continue;
      }

      if (/[A-Za-z_]/.test(char)) {
        const { token, length } = this.readWordToken("identifier", cleaned, i, lineNumber, column);
        tokens.push(token);
        i += length;
        continue;
      }

      throw new Error(`Unexpected character '${char}' at line ${lineNumber}, column ${column}`);
    }

    return tokens;
  }

  private stripComment(text: string): string {
    for (let i = 0; i < text.length; i++) {
      const char = text[i];
      if (char === "#" || char === ";") {
        return text.slice(0, i);
      }
      if (char === "/" && text[i + 1] === "/") {
        return text.slice(0, i);
      }
    }
    return text;
  }

  private readWordToken(
    type: "identifier" | "directive",
    text: string,
    start: number,
    line: number,
    column: number,
  ): { token: Token; length: number } {
    let i = start;
    while (i < text.length && /[A-Za-z0-9_.]/.test(text[i])) i++;
    const raw = text.slice(start - (type === "identifier" ? 0 : 1), i);
    const value = text.slice(start, i).toLowerCase();
    if (value.length === 0) {
      throw new Error(`Empty ${type} at line ${line}, column ${column}`);
    }
    return {
      token: { type, value: type === "identifier" ? text.slice(start, i) : value, line, column, raw },
      length: i - start,
    };
  }

  private readNumber(text: string, start: number, line: number, column: number): { token: Token; length: number } {
    let i = start;
    let sign = 1;
    if (text[i] === "-" || text[i] === "+") {
      sign = text[i] === "-" ? -1 : 1;
      i++;
    }

    const digitsStart = i;
    while (i < text.length && /[0-9A-Za-z_]/.test(text[i])) {
      i++;
    }

    const raw = text.slice(start, i);
    const digits = text.slice(digitsStart, i).replace(/_/g, "");
    let magnitude = Number.NaN;
    if (/^0[xX][0-9A-Fa-f]+$/.test(digits)) {
      magnitude = parseInt(digits.slice(2), 16);
    } else if (/^0[bB][01]+$/.test(digits)) {
      magnitude = parseInt(digits.slice(2), 2);
    } else if (/^[0-9]+$/.test(digits)) {
      magnitude = parseInt(digits, 10);
    }

    if (!Number.isFinite(magnitude)) {
      throw new Error(`Invalid number '${raw}' at line ${line}, column ${column}`);
    }

    return {
      token: { type: "number", value: sign * magnitude, line, column, raw },
      length: i - start,
    };
  }
}
