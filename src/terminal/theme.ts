import { dim, red, yellow } from "kleur/colors";

type Paint = (text: string) => string;

export const theme = {
  warn: yellow,
  error: red,
  muted: dim,
} satisfies Record<string, Paint>;

export type ThemeColor = keyof typeof theme;

type TtyLike = { isTTY?: boolean };

/**
 * Whether to emit ANSI colors on `stream`. NO_COLOR wins over FORCE_COLOR.
 */
export function isRich(
  stream: TtyLike = process.stdout,
  env: NodeJS.ProcessEnv = process.env,
): boolean {
  if (env.NO_COLOR !== undefined && env.NO_COLOR !== "") {
    return false;
  }
  if (env.FORCE_COLOR !== undefined && env.FORCE_COLOR !== "0") {
    return true;
  }
  if (env.TERM === "dumb") {
    return false;
  }
  return stream.isTTY === true;
}

export function paint(rich: boolean, color: ThemeColor, text: string): string {
  return rich ? theme[color](text) : text;
}
