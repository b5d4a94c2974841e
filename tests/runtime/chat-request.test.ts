import { describe, expect, it } from "vitest";
import { ValidationError } from "../../src/core/errors.js";
import { parseChatRequest, validateQuestion } from "../../src/runtime/chat-request.js";

function issuesOf(body: unknown): Array<{ loc: Array<string | number>; msg: string }> {
  try {
    parseChatRequest(body, "sid");
  } catch (error) {
    if (error instanceof ValidationError) {
      return error.issues.map(({ loc, msg }) => ({ loc, msg }));
    }
    throw error;
  }
  throw new Error("expected a validation error");
}

describe("parseChatRequest", () => {
  it("rejects empty and blank questions as non-empty violations", () => {
    for (const question of ["", "   "]) {
      expect(issuesOf({ question })).toEqual([
        { loc: ["body", "question"], msg: "question must be a non-empty string" },
      ]);
    }
  });

  it("rejects punctuation-only questions as unclear", () => {
    expect(issuesOf({ question: "??" })).toEqual([
      { loc: ["body", "question"], msg: "question appears unclear; please include alphanumeric characters" },
    ]);
  });

  it("rejects questions longer than 1000 characters", () => {
    expect(issuesOf({ question: "a".repeat(1001) })).toEqual([
      { loc: ["body", "question"], msg: "question is too long; maximum 1000 characters" },
    ]);
    expect(parseChatRequest({ question: "a".repeat(1000) }, "sid").question).toHaveLength(1000);
  });

  it("rejects short questions and accepts exactly three trimmed characters", () => {
    expect(issuesOf({ question: "hi" })).toEqual([
      { loc: ["body", "question"], msg: "question is too short; please provide more details" },
    ]);
    expect(parseChatRequest({ question: "  why  " }, "sid").question).toBe("why");
  });

  it("reports a missing question", () => {
    expect(issuesOf({})).toEqual([{ loc: ["body", "question"], msg: "question is required" }]);
    expect(issuesOf(undefined)).toEqual([{ loc: ["body", "question"], msg: "question is required" }]);
  });

  it("rejects a body that is not an object", () => {
    expect(issuesOf(["What is gravity?"])).toEqual([{ loc: ["body"], msg: "request body must be a JSON object" }]);
  });

  it("reports every violated field at once", () => {
    expect(issuesOf({ question: "", max_history: -1 })).toEqual([
      { loc: ["body", "question"], msg: "question must be a non-empty string" },
      { loc: ["body", "max_history"], msg: "max_history must be greater than or equal to 0" },
    ]);
  });

  it("reports question content rules together with other field violations", () => {
    expect(issuesOf({ question: "ab", max_history: -1 })).toEqual([
      { loc: ["body", "question"], msg: "question is too short; please provide more details" },
      { loc: ["body", "max_history"], msg: "max_history must be greater than or equal to 0" },
    ]);
    expect(issuesOf({ question: "??", max_history: 1.5 })).toEqual([
      { loc: ["body", "question"], msg: "question appears unclear; please include alphanumeric characters" },
      { loc: ["body", "max_history"], msg: "max_history must be an integer" },
    ]);
  });

  it("tags question content violations as value errors", () => {
    try {
      parseChatRequest({ question: "hi" }, "sid");
      throw new Error("expected a validation error");
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError);
      if (error instanceof ValidationError) {
        expect(error.issues.map((issue) => issue.type)).toEqual(["value_error"]);
      }
    }
  });

  it("requires an integer max_history", () => {
    expect(issuesOf({ question: "What is gravity?", max_history: 2.5 })).toEqual([
      { loc: ["body", "max_history"], msg: "max_history must be an integer" },
    ]);
  });

  it("applies defaults and normalizes optional fields", () => {
    expect(parseChatRequest({ question: " What is gravity? " }, "sid")).toEqual({
      sessionId: "sid",
      question: "What is gravity?",
      maxHistory: 10,
    });
    expect(parseChatRequest({ question: "What is gravity?", max_history: null }, "sid").maxHistory).toBe(0);
    expect(parseChatRequest({ question: "What is gravity?", max_history: 3 }, "sid").maxHistory).toBe(3);
    expect(parseChatRequest({ question: "What is gravity?", context: "  physics " }, "sid").context).toBe("physics");
    expect(parseChatRequest({ question: "What is gravity?", context: "   " }, "sid")).not.toHaveProperty("context");
  });

  it("overrides a session id supplied in the body", () => {
    expect(parseChatRequest({ question: "What is gravity?", session_id: "other" }, "sid").sessionId).toBe("sid");
  });
});

describe("validateQuestion", () => {
  it("accepts letters and digits from any script", () => {
    expect(validateQuestion("¿Qué?")).toBeUndefined();
    expect(validateQuestion("2+2")).toBeUndefined();
  });
});
