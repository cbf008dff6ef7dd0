import { createPasswordHasher } from "./password";

describe("createPasswordHasher", () => {
  const hasher = createPasswordHasher(4);

  it("should produce a salted bcrypt hash that verifies", async () => {
    const first = await hasher.hash("pw123");
    const second = await hasher.hash("pw123");

    expect(first).toMatch(/^\$2b\$04\$/);
    expect(first).not.toBe(second);
    await expect(hasher.verify(first, "pw123")).resolves.toBe(true);
    await expect(hasher.verify(first, "pw124")).resolves.toBe(false);
  });

  it("should accept a password of exactly 72 bytes", async () => {
    const hash = await hasher.hash("a".repeat(72));

    await expect(hasher.verify(hash, "a".repeat(72))).resolves.toBe(true);
  });

  it("should refuse passwords longer than 72 bytes", async () => {
    // 37 two-byte characters
    await expect(hasher.hash("é".repeat(37))).rejects.toThrow("password exceeds 72 bytes");
  });
});
