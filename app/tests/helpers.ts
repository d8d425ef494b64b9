import { expect } from "vitest";
import { isNotationError } from "@notation/errors";
import type { NotationErrorCode } from "@notation/errors";

export function expectNotationError(action: () => unknown, code: NotationErrorCode): void {
  let caught: unknown;
  try {
    action();
  } catch (error) {
    caught = error;
  }
  expect(isNotationError(caught)).toBe(true);
  if (isNotationError(caught)) {
    expect(caught.code).toBe(code);
  }
}
