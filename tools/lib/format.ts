// ANSI codes
export const RESET = "\x1b[0m"
export const BOLD = "\x1b[1m"
export const DIM = "\x1b[2m"
export const RED = "\x1b[31m"
export const GREEN = "\x1b[32m"
export const YELLOW = "\x1b[33m"
export const BLUE = "\x1b[34m"
export const CYAN = "\x1b[36m"

export interface Painter {
  (code: string, text: string): string
}

/**
 * Wrap text in an ANSI code, or leave it plain when color is off
 */
export function painter(color: boolean): Painter {
  return (code, text) => (color ? `${code}${text}${RESET}` : text)
}

const MARKS = {
  info: [BLUE, "→"],
  success: [GREEN, "✓"],
  warn: [YELLOW, "⚠"],
  error: [RED, "✗"],
} as const

export type StatusKind = keyof typeof MARKS

/**
 * One status line for the terminal: "✓ Deployed 3 reports"
 */
export function status(kind: StatusKind, msg: string, color = true): string {
  const [code, mark] = MARKS[kind]
  return `${painter(color)(code, mark)} ${msg}`
}

export function plural(count: number, word: string): string {
  return `${count} ${word}${count === 1 ? "" : "s"}`
}
