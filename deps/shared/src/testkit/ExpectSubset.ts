import { expect } from "vitest";

export function expectHasSubset<T extends object>(
  actual: T,
  subset: Partial<T> & object
): void {
  expect(actual).toMatchObject(subset);
}
