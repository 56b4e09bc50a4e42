export type InvalidSelectionReason = "empty" | "not-a-number" | "out-of-range";

export type Selection =
  | { kind: "quit" }
  /** 1-based, as displayed */
  | { kind: "index"; index: number }
  | { kind: "invalid"; reason: InvalidSelectionReason; input: string };

export const QUIT_TOKEN = "q";

const DIGITS = /^\d+$/;

/**
 * Classify one line of menu input against a listing of `count` projects.
 */
export function classifySelection(input: string, count: number): Selection {
  const trimmed = input.trim();

  if (trimmed.toLowerCase() === QUIT_TOKEN) {
    return { kind: "quit" };
  }
  if (trimmed === "") {
    return { kind: "invalid", reason: "empty", input: trimmed };
  }
  // Signs, decimals and exponents are rejected, not coerced
  if (!DIGITS.test(trimmed)) {
    return { kind: "invalid", reason: "not-a-number", input: trimmed };
  }

  const index = Number.parseInt(trimmed, 10);
  if (index < 1 || index > count) {
    return { kind: "invalid", reason: "out-of-range", input: trimmed };
  }
  return { kind: "index", index };
}

export function invalidSelectionMessage(reason: InvalidSelectionReason): string {
  switch (reason) {
    case "out-of-range":
      return "Invalid selection. Please enter a valid project number.";
    case "empty":
    case "not-a-number":
      return "Please enter a valid number or 'q' to quit.";
  }
}
