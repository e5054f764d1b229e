import { randomBytes } from "node:crypto";
import { z } from "zod";

export const HEX_PLACEHOLDER = "<hex>";
/** Random bytes behind each placeholder (16 hex characters). */
export const HEX_PLACEHOLDER_BYTES = 8;
/** Two placeholders give 128 bits of entropy. */
export const MIN_HEX_PLACEHOLDERS = 2;

export function countPlaceholders(template: string): number {
  return template.split(HEX_PLACEHOLDER).length - 1;
}

export const flagTemplateSchema = z
  .string()
  .min(1)
  .refine((t) => countPlaceholders(t) >= MIN_HEX_PLACEHOLDERS, {
    message: `FLAG_TEMPLATE must contain at least ${MIN_HEX_PLACEHOLDERS} ${HEX_PLACEHOLDER} placeholders`,
  })
  .refine((t) => !t.includes("{") && !t.includes("}"), {
    message: "FLAG_TEMPLATE must not contain braces",
  });

export interface FlagFormat {
  prefix: string;
  template: string;
}

/**
 * Build a fresh flag: `PREFIX{...}` with every `<hex>` in the template
 * replaced by its own random bytes. Nothing about the instance goes in.
 */
export function generateFlag(format: FlagFormat, random: (size: number) => Buffer = randomBytes): string {
  const body = format.template
    .split(HEX_PLACEHOLDER)
    .reduce((acc, part, i) => (i === 0 ? part : acc + random(HEX_PLACEHOLDER_BYTES).toString("hex") + part), "");
  return `${format.prefix}{${body}}`;
}

/**
 * Log-safe form of a flag: prefix kept, body reduced to its first and last
 * three characters.
 */
export function redactFlag(flag: string): string {
  const open = flag.indexOf("{");
  const wrapped = open >= 0 && flag.endsWith("}");
  const head = wrapped ? flag.slice(0, open + 1) : "";
  const tail = wrapped ? "}" : "";
  const body = wrapped ? flag.slice(open + 1, -1) : flag;
  if (body.length <= 8) return `${head}***${tail}`;
  return `${head}${body.slice(0, 3)}...${body.slice(-3)}${tail}`;
}
