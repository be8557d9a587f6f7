import { z } from "zod";
import { InvalidNameError } from "../errors.js";

export const FileNameSchema = z
  .string()
  .min(1, "File name must not be empty")
  .refine((v) => v !== "." && v !== "..", "File name must not be a dot segment")
  .refine(
    (v) => !v.includes("/") && !v.includes("\\"),
    "File name must not contain path separators",
  )
  .refine((v) => !v.includes("\0"), "File name must not contain NUL")
  .brand<"FileName">();

export type FileName = z.infer<typeof FileNameSchema>;

export function parseFileName(value: string): FileName {
  const result = FileNameSchema.safeParse(value);
  if (!result.success) {
    const reason = result.error.issues[0]?.message ?? "Invalid file name";
    throw new InvalidNameError(`${reason}: ${JSON.stringify(value)}`, {
      value,
    });
  }
  return result.data;
}
