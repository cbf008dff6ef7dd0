import { Account, App, NewSession, Session } from "../types/auth";
import { AccountStore } from "../models/account.model";
import { SessionStore } from "../models/session.model";
import { AppProvider } from "../types/auth";
import { AuthError, ErrorKinds } from "../utils/errors";
import { IP_ADDRESS_MAX_LENGTH, USER_AGENT_MAX_LENGTH } from "../schemas/sessions.schema";

/**
 * In-process stand-ins for the drizzle stores. They follow the same contracts:
 * lookups raise the *_NOT_FOUND kinds, revocation is idempotent and revoked
 * rows are invisible to every read.
 */

export interface TestClock {
  now: () => Date;
  advance: (ms: number) => void;
}

export const createTestClock = (start = new Date("2026-01-01T00:00:00.000Z")): TestClock => {
  let current = start.getTime();
  return {
    now: () => new Date(current),
    advance: (ms: number) => {
      current += ms;
    },
  };
};

export const createMemoryAccountStore = () => {
  const rows = new Map<number, Account>();
  let nextId = 1;

  const byEmail = (email: string) =>
    Array.from(rows.values()).find((account) => account.email === email.toLowerCase().trim());

  const byId = (op: string, accountId: number) => {
    const account = rows.get(accountId);
    if (!account) throw new AuthError(ErrorKinds.ACCOUNT_NOT_FOUND, op);
    return account;
  };

  const store: AccountStore = {
    saveAccount: async (input) => {
      if (byEmail(input.email)) {
        throw new AuthError(ErrorKinds.ACCOUNT_EXISTS, "accounts.saveAccount");
      }
      const id = nextId++;
      rows.set(id, { id, ...input, email: input.email.toLowerCase().trim() });
      return id;
    },
    updatePassword: async (accountId, passHash) => {
      const account = byId("accounts.updatePassword", accountId);
      rows.set(accountId, { ...account, passHash });
    },
    updateStatus: async (accountId, status) => {
      const account = byId("accounts.updateStatus", accountId);
      rows.set(accountId, { ...account, status });
    },
    accountByEmail: async (email) => {
      const account = byEmail(email);
      if (!account) throw new AuthError(ErrorKinds.ACCOUNT_NOT_FOUND, "accounts.accountByEmail");
      return { ...account };
    },
    accountById: async (accountId) => ({ ...byId("accounts.accountById", accountId) }),
    isAdmin: async (accountId) => byId("accounts.isAdmin", accountId).role === "admin",
  };

  return { store, rows };
};

export const createMemoryAppStore = (apps: App[]) => {
  const store: AppProvider = {
    app: async (appId) => {
      const app = apps.find((candidate) => candidate.id === appId);
      if (!app) throw new AuthError(ErrorKinds.APP_NOT_FOUND, "apps.app");
      return { ...app };
    },
  };
  return { store };
};

interface SessionRow extends Session {
  revokedAt: Date | null;
}

export const createMemorySessionStore = (now: () => Date) => {
  const rows: SessionRow[] = [];
  let nextId = 1;

  const live = () => rows.filter((row) => row.revokedAt === null);

  const toSession = ({ revokedAt: _revokedAt, ...session }: SessionRow): Session => ({ ...session });

  const findLive = (op: string, match: (row: SessionRow) => boolean) => {
    const row = live().find(match);
    if (!row) throw new AuthError(ErrorKinds.SESSION_NOT_FOUND, op);
    return toSession(row);
  };

  const store: SessionStore = {
    saveSession: async (input: NewSession) => {
      if (input.userAgent.length > USER_AGENT_MAX_LENGTH || input.ipAddress.length > IP_ADDRESS_MAX_LENGTH) {
        throw new Error("value too long for type character varying");
      }
      if (rows.some((row) => row.refreshToken === input.refreshToken || row.token === input.token)) {
        throw new Error("duplicate key value violates unique constraint");
      }
      const sessionId = `session-${nextId++}`;
      rows.push({ ...input, sessionId, createdAt: now(), revokedAt: null });
      return sessionId;
    },
    revokeSession: async (token) => {
      for (const row of live()) {
        if (row.token === token) row.revokedAt = now();
      }
    },
    pruneSessions: async (expiredBefore, revokedBefore) => {
      const doomed = rows.filter(
        (row) =>
          (row.refreshExpiresAt.getTime() < expiredBefore.getTime() &&
            row.expiresAt.getTime() < expiredBefore.getTime()) ||
          (row.revokedAt !== null && row.revokedAt.getTime() < revokedBefore.getTime())
      );
      for (const row of doomed) rows.splice(rows.indexOf(row), 1);
      return doomed.length;
    },
    sessions: async (accountId) =>
      live()
        .filter((row) => row.accountId === accountId)
        .map(toSession),
    session: async (token) => findLive("sessions.session", (row) => row.token === token),
    sessionByRefreshToken: async (refreshToken) =>
      findLive("sessions.sessionByRefreshToken", (row) => row.refreshToken === refreshToken),
  };

  return { store, rows };
};
