import { nonEmptyString, parseId } from "./request";

describe("parseId", () => {
  it.each([
    [1, 1],
    ["42", 42],
    [" 7 ", 7],
  ])("should accept %j", (input, expected) => {
    expect(parseId(input)).toBe(expected);
  });

  it.each([0, -3, 1.5, "", "abc", "1e400", null, undefined, {}])("should reject %j", (input) => {
    expect(parseId(input)).toBeNull();
  });
});

describe("nonEmptyString", () => {
  it("should keep non-blank strings as they are", () => {
    expect(nonEmptyString(" pw ")).toBe(" pw ");
  });

  it.each(["", "   ", 5, null])("should reject %j", (input) => {
    expect(nonEmptyString(input)).toBeNull();
  });
});
