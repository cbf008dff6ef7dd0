import bcrypt from "bcrypt";
import { PasswordHasher } from "../types/auth";

export const BCRYPT_COST = 10;

// bcrypt only reads the first 72 bytes of its input
export const BCRYPT_MAX_BYTES = 72;

export const createPasswordHasher = (cost: number = BCRYPT_COST): PasswordHasher => ({
  hash: async (password: string) => {
    if (Buffer.byteLength(password, "utf8") > BCRYPT_MAX_BYTES) {
      throw new Error(`password exceeds ${BCRYPT_MAX_BYTES} bytes`);
    }
    return bcrypt.hash(password, cost);
  },

  verify: async (passHash: string, password: string) => {
    return bcrypt.compare(password, passHash);
  },
});
