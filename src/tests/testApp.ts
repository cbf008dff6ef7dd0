import { createApp } from "../index";
import { createAuthService } from "../services/auth.service";
import { silentLogger } from "../config/logger";
import { App } from "../types/auth";
import { createPasswordHasher } from "../utils/password";
import { generateRefreshToken, jwtTokenSigner } from "../utils/token";
import {
  createMemoryAccountStore,
  createMemoryAppStore,
  createMemorySessionStore,
  createTestClock,
} from "./memoryStores";

export const HOUR = 60 * 60 * 1000;
export const DAY = 24 * HOUR;

// 2026-01-01T00:00:00Z, where every test clock starts
export const START_UNIX = 1767225600;

export const TEST_APP: App = {
  id: 1,
  name: "test-app",
  secret: "test-secret",
  tokenTTL: 3600,
  refreshTokenTTL: 86400,
  redirectURL: null,
};

/**
 * Express app wired to in-memory stores and a manual clock.
 */
export const createTestApp = (checkDbConnection: () => Promise<void> = async () => undefined) => {
  const clock = createTestClock();
  const accounts = createMemoryAccountStore();
  const apps = createMemoryAppStore([TEST_APP]);
  const sessions = createMemorySessionStore(clock.now);

  const authService = createAuthService({
    logger: silentLogger,
    accountSaver: accounts.store,
    accountProvider: accounts.store,
    appProvider: apps.store,
    sessionSaver: sessions.store,
    sessionProvider: sessions.store,
    hasher: createPasswordHasher(4),
    signer: jwtTokenSigner,
    generateRefreshToken,
    tokenTTL: HOUR,
    refreshTokenTTL: DAY,
    now: clock.now,
  });

  const app = createApp({
    authService,
    logger: silentLogger,
    checkDbConnection,
    isProduction: false,
    corsOrigins: [],
    tokenTTL: HOUR,
    refreshTokenTTL: DAY,
  });

  return { app, authService, clock, sessions };
};
