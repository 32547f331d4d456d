import { z } from "zod";
import { responseError } from "../errors.js";
import { silentLogger } from "../logger.js";
import type { Logger } from "../types.js";

export type ResponseShape = "chat" | "generate" | "any";

interface ShapeRules {
  /** Top-level structure; a mismatch fails validation */
  required: z.ZodTypeAny;
  /** Nested or optional fields; a mismatch is only logged */
  advisory: z.ZodTypeAny;
}

const SHAPES: Record<Exclude<ResponseShape, "any">, ShapeRules> = {
  chat: {
    required: z.object({ message: z.object({}).passthrough() }).passthrough(),
    advisory: z.object({ message: z.object({ content: z.string() }).passthrough(), done: z.boolean() }).passthrough(),
  },
  generate: {
    required: z.object({ response: z.string() }).passthrough(),
    advisory: z.object({ done: z.boolean() }).passthrough(),
  },
};

export interface ResponseValidatorOptions {
  /** When false, {@link ResponseValidator.validate} is a no-op (default: true) */
  enabled?: boolean | undefined;
  logger?: Logger | undefined;
}

function describeField(issue: z.ZodIssue | undefined): string {
  return issue?.path.join(".") || "response";
}

function formatErrorField(value: unknown): string {
  return typeof value === "string" ? value : JSON.stringify(value);
}

/**
 * Checks a payload before it is handed back to the caller. Strict about the
 * payload being present, error markers and top-level fields; advisory about
 * nested ones.
 */
export class ResponseValidator {
  readonly enabled: boolean;
  private readonly logger: Logger;

  constructor(options: ResponseValidatorOptions = {}) {
    this.enabled = options.enabled ?? true;
    this.logger = options.logger ?? silentLogger;
  }

  /** @throws {SecretAIError} RESPONSE when the payload is unusable */
  validate(response: unknown, shape: ResponseShape = "any"): void {
    if (!this.enabled) return;

    if (response === null || response === undefined) {
      throw responseError("Received null response", response);
    }

    if (typeof response === "object" && "error" in response) {
      throw responseError(`Server returned error: ${formatErrorField(response.error)}`, response);
    }

    if (shape === "any") return;
    const rules = SHAPES[shape];

    const required = rules.required.safeParse(response);
    if (!required.success) {
      const issue = required.error.issues[0];
      const detail = issue && issue.path.length > 0 ? `has no valid '${describeField(issue)}' field` : "is not an object";
      throw responseError(`${shape} response ${detail}`, response);
    }

    const advisory = rules.advisory.safeParse(response);
    if (!advisory.success) {
      for (const issue of advisory.error.issues) {
        this.logger.warn(`${shape} response field '${describeField(issue)}' is missing or malformed`, {
          issue: issue.message,
        });
      }
    }
  }
}
