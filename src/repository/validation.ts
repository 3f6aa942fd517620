import { z } from "zod";
import { InvalidParameterError } from "../errors.js";

export const PushArgsSchema = z.object({
  message: z.string({
    required_error: "commit_message must be provided!",
    invalid_type_error: "commit_message must be a string",
  }).min(1, "commit_message must be provided!"),
  branch: z.string({ invalid_type_error: "branch must be a string" }).min(1, "branch must not be empty"),
  force: z.boolean({ invalid_type_error: "force must be bool" }),
});
export type PushArgs = z.infer<typeof PushArgsSchema>;

export function parsePushArgs(input: unknown): PushArgs {
  const result = PushArgsSchema.safeParse(input);
  if (!result.success) {
    throw new InvalidParameterError(result.error.issues.map((issue) => issue.message));
  }
  return result.data;
}
