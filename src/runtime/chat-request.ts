import { z } from "zod";
import { ValidationError, type ValidationIssue } from "../core/errors.js";

export const DEFAULT_MAX_HISTORY = 10;
export const MIN_QUESTION_LENGTH = 3;
export const MAX_QUESTION_LENGTH = 1000;

const ALPHANUMERIC = /[\p{L}\p{N}]/u;

const chatRequestSchema = z.object(
  {
    session_id: z
      .string({ required_error: "session_id is required", invalid_type_error: "session_id must be a string" })
      .trim()
      .min(1, "session_id must be a non-empty string"),
    question: z
      .string({ required_error: "question is required", invalid_type_error: "question must be a string" })
      .trim()
      .min(1, "question must be a non-empty string")
      .superRefine((question, ctx) => {
        // blank input already failed the minimum above
        const problem = question ? validateQuestion(question) : undefined;
        if (problem) {
          ctx.addIssue({ code: z.ZodIssueCode.custom, message: problem });
        }
      }),
    context: z.string({ invalid_type_error: "context must be a string" }).nullish(),
    max_history: z
      .number({ invalid_type_error: "max_history must be an integer" })
      .int("max_history must be an integer")
      .min(0, "max_history must be greater than or equal to 0")
      .nullish(),
  },
  { invalid_type_error: "request body must be a JSON object" },
);

export interface ChatRequest {
  sessionId: string;
  /** Trimmed. */
  question: string;
  context?: string;
  /** 0 forwards the full history. */
  maxHistory: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toIssues(error: z.ZodError): ValidationIssue[] {
  return error.issues.map((issue) => ({
    loc: ["body", ...issue.path],
    msg: issue.message,
    type: issue.code === z.ZodIssueCode.custom ? "value_error" : issue.code,
  }));
}

/**
 * Content rules on an already-trimmed question. The noise check runs first so
 * that short punctuation-only input reads as unclear rather than short.
 */
export function validateQuestion(question: string): string | undefined {
  if (!question) {
    return "question must not be empty";
  }
  if (!ALPHANUMERIC.test(question)) {
    return "question appears unclear; please include alphanumeric characters";
  }
  const length = [...question].length;
  if (length < MIN_QUESTION_LENGTH) {
    return "question is too short; please provide more details";
  }
  if (length > MAX_QUESTION_LENGTH) {
    return `question is too long; maximum ${MAX_QUESTION_LENGTH} characters`;
  }
  return undefined;
}

/**
 * Validates a submitted body against the resolved session. Question content
 * rules are reported alongside any other field's violations. A `session_id`
 * inside the body is replaced so the header stays the only source of truth.
 */
export function parseChatRequest(body: unknown, sessionId: string): ChatRequest {
  const fields = body ?? {};
  const merged = isRecord(fields) ? { ...fields, session_id: sessionId } : fields;

  const parsed = chatRequestSchema.safeParse(merged);
  if (!parsed.success) {
    throw new ValidationError(toIssues(parsed.error));
  }

  const context = parsed.data.context?.trim();
  return {
    sessionId: parsed.data.session_id,
    question: parsed.data.question,
    ...(context ? { context } : {}),
    maxHistory: parsed.data.max_history === undefined ? DEFAULT_MAX_HISTORY : parsed.data.max_history ?? 0,
  };
}
