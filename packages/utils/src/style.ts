export type StyleToken =
  // Reset & text decorations
  | "reset"
  | "dim"
  | "bold"
  // Foreground colors
  | "red"
  | "yellow"
  | "green"
  | "cyan"
  | "gray";

const ANSI: Record<StyleToken, string> = {
  reset: "\x1b[0m",
  dim: "\x1b[2m",
  bold: "\x1b[1m",
  red: "\x1b[31m",
  yellow: "\x1b[33m",
  green: "\x1b[32m",
  cyan: "\x1b[36m",
  gray: "\x1b[90m",
};

const SGR_PATTERN = /\x1b\[[0-9;]*m/g;

/**
 * Visible width of text, ignoring ANSI SGR sequences.
 */
export function visibleLength(text: string): number {
  return text.replace(SGR_PATTERN, "").length;
}

export function padRight(text: string, width: number): string {
  const len = visibleLength(text);
  return len >= width ? text : text + " ".repeat(width - len);
}

export function padLeft(text: string, width: number): string {
  const len = visibleLength(text);
  return len >= width ? text : " ".repeat(width - len) + text;
}

export class Style {
  private readonly noColor: boolean;

  constructor(args: { noColor: boolean }) {
    // NO_COLOR is honoured in addition to app config
    this.noColor = args.noColor || process.env.NO_COLOR !== undefined;
  }

  enabled(): boolean {
    return !this.noColor;
  }

  /**
   * Wrap text with style tokens and reset at the end.
   * e.g. style.wrap("FAILED", "bold", "red") => "\x1b[1m\x1b[31mFAILED\x1b[0m"
   */
  wrap(text: string, ...tokens: StyleToken[]): string {
    if (this.noColor || tokens.length === 0) return text;
    return tokens.map(t => ANSI[t]).join("") + text + ANSI.reset;
  }

  /**
   * Color a signed figure: green above zero, red below, plain at zero.
   */
  signed(value: number, text: string = String(value)): string {
    if (value > 0) return this.wrap(text, "green");
    if (value < 0) return this.wrap(text, "red");
    return text;
  }
}
