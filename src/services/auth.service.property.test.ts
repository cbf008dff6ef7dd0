/**
 * Property-based tests for session expiry boundaries.
 */

import * as fc from "fast-check";
import { createAuthService } from "./auth.service";
import { PasswordHasher } from "../types/auth";
import { silentLogger } from "../config/logger";
import { generateRefreshToken, jwtTokenSigner } from "../utils/token";
import { isAuthError, ErrorKinds } from "../utils/errors";
import {
  createMemoryAccountStore,
  createMemoryAppStore,
  createMemorySessionStore,
  createTestClock,
} from "../tests/memoryStores";
import { DAY, HOUR, START_UNIX, TEST_APP } from "../tests/testApp";

const START_MS = START_UNIX * 1000;

// bcrypt is covered elsewhere; a reversible stand-in keeps each run fast
const plainHasher: PasswordHasher = {
  hash: async (password) => `plain:${password}`,
  verify: async (passHash, password) => passHash === `plain:${password}`,
};

const loggedIn = async () => {
  const clock = createTestClock();
  const accounts = createMemoryAccountStore();
  const sessions = createMemorySessionStore(clock.now);
  const service = createAuthService({
    logger: silentLogger,
    accountSaver: accounts.store,
    accountProvider: accounts.store,
    appProvider: createMemoryAppStore([TEST_APP]).store,
    sessionSaver: sessions.store,
    sessionProvider: sessions.store,
    hasher: plainHasher,
    signer: jwtTokenSigner,
    generateRefreshToken,
    tokenTTL: HOUR,
    refreshTokenTTL: DAY,
    now: clock.now,
  });

  const accountId = await service.registerNewAccount("a@x.com", "pw123", "user", 1);
  const pair = await service.login("a@x.com", "pw123", "agent", "10.0.0.1", 1);
  return { service, clock, accountId, ...pair };
};

describe("Auth Service - expiry properties", () => {
  it("should report a session valid exactly while less than the token TTL has elapsed", async () => {
    await fc.assert(
      fc.asyncProperty(fc.integer({ min: 0, max: 2 * DAY }), async (elapsed) => {
        const { service, clock, accessToken } = await loggedIn();
        clock.advance(elapsed);

        const result = await service.validateAccountSession(accessToken);

        expect(result).toEqual({ valid: elapsed < HOUR, expiresAt: START_UNIX + 3600 });
      }),
      { numRuns: 50 }
    );
  });

  it("should refresh exactly while less than the refresh TTL has elapsed", async () => {
    await fc.assert(
      fc.asyncProperty(fc.integer({ min: 0, max: 2 * DAY }), async (elapsed) => {
        const { service, clock, accountId, refreshToken } = await loggedIn();
        clock.advance(elapsed);

        try {
          const refreshed = await service.refreshAccountSession(accountId, refreshToken, "agent", "10.0.0.1");
          expect(elapsed).toBeLessThan(DAY);
          expect(refreshed.expiresAt).toBe(Math.floor((START_MS + elapsed + DAY) / 1000));
        } catch (error) {
          expect(isAuthError(error, ErrorKinds.REFRESH_TOKEN_EXPIRED)).toBe(true);
          expect(elapsed).toBeGreaterThanOrEqual(DAY);
        }
      }),
      { numRuns: 50 }
    );
  });

  it("should never let a refreshed session expire before the one it came from", async () => {
    await fc.assert(
      fc.asyncProperty(fc.integer({ min: 0, max: DAY - 1 }), async (elapsed) => {
        const { service, clock, accountId, refreshToken } = await loggedIn();
        clock.advance(elapsed);

        const refreshed = await service.refreshAccountSession(accountId, refreshToken, "agent", "10.0.0.1");
        const validation = await service.validateAccountSession(refreshed.accessToken);

        expect(validation.valid).toBe(true);
        expect(validation.expiresAt).toBeGreaterThanOrEqual(START_UNIX + 3600);
        expect(refreshed.expiresAt).toBeGreaterThanOrEqual(START_UNIX + 86400);
      }),
      { numRuns: 50 }
    );
  });
});
