import { z } from "zod";

/**
 * Parameter schemas of the relay methods. Unknown keys are stripped rather
 * than rejected: agents routinely send extra hints alongside the documented
 * parameters.
 */

/** Session reference such as `%7`. Only non-blank strings are enforced. */
const SessionIdSchema = z
  .string({ required_error: "Required", invalid_type_error: "must be a string" })
  .refine((value) => value.trim().length > 0, "must be a non-empty session id (e.g. '%7')");

/** Lower-cases string inputs before matching an enum, so `"TEXT"` reads as `"text"`. */
function caseInsensitive<T extends [string, ...string[]]>(values: T, fallback: T[number]) {
  return z.preprocess(
    (value) => (typeof value === "string" ? value.toLowerCase() : value),
    z.enum(values).default(fallback),
  );
}

export const WORKDIR_POLICIES = ["require_empty_existing", "use_existing", "create_new", "create_or_empty"] as const;
export type WorkdirPolicy = (typeof WORKDIR_POLICIES)[number];

export const HOOK_MODES = ["text", "screenshot"] as const;
export type HookMode = (typeof HOOK_MODES)[number];

export const INJECT_MODES = ["append", "replace"] as const;
export type InjectMode = (typeof INJECT_MODES)[number];

export const EmptyParamsSchema = z.object({});

export const StartSessionParamsSchema = z
  .object({
    workdir: z.string().trim().min(1).optional(),
    workdir_policy: caseInsensitive([...WORKDIR_POLICIES], "require_empty_existing"),
    add_hook: z.boolean().default(false),
    hook_mode: caseInsensitive([...HOOK_MODES], "text"),
    calledagent: SessionIdSchema.optional(),
    text: z.string().optional(),
  })
  .superRefine((params, ctx) => {
    if (!params.add_hook) {
      return;
    }
    if (params.calledagent === undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["calledagent"], message: "required when add_hook is true" });
    }
    if (params.hook_mode === "text" && params.text === undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["text"], message: "required when hook_mode is 'text'" });
    }
  });
export type StartSessionParams = z.infer<typeof StartSessionParamsSchema>;

export const TargetParamsSchema = z.object({
  target_id: SessionIdSchema,
});
export type TargetParams = z.infer<typeof TargetParamsSchema>;

export const SendMessageParamsSchema = z.object({
  target_id: SessionIdSchema,
  text: z.string(),
});
export type SendMessageParams = z.infer<typeof SendMessageParamsSchema>;

export const InjectInputParamsSchema = z.object({
  target_id: SessionIdSchema,
  text: z.string(),
  with_from: z.boolean().default(false),
  prefix: z.string().optional(),
  submit: z.boolean().default(true),
  mode: caseInsensitive([...INJECT_MODES], "append"),
});
export type InjectInputParams = z.infer<typeof InjectInputParamsSchema>;

export const AddCallbackHookParamsSchema = z
  .object({
    hookedagent: SessionIdSchema,
    hooked_workdir: z
      .string()
      .refine((value) => value.trim().length > 0, "must be the absolute project root of the hooked agent"),
    calledagent: SessionIdSchema,
    mode: caseInsensitive([...HOOK_MODES], "text"),
    text: z.string().optional(),
  })
  .superRefine((params, ctx) => {
    if (params.mode === "text" && params.text === undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["text"], message: "required when mode is 'text'" });
    }
  });
export type AddCallbackHookParams = z.infer<typeof AddCallbackHookParamsSchema>;

export const CheckMessageBoxParamsSchema = z.object({
  since_id: z.coerce.number().int().min(0).default(0),
});
export type CheckMessageBoxParams = z.infer<typeof CheckMessageBoxParamsSchema>;

/** `tools/call` envelope. `arguments` may be omitted or null. */
export const ToolsCallParamsSchema = z.object({
  name: z.string().min(1),
  arguments: z.record(z.unknown()).nullish(),
});
export type ToolsCallParams = z.infer<typeof ToolsCallParamsSchema>;

export const InitializeParamsSchema = z.object({
  protocolVersion: z.string().optional(),
});
