import { SQL, and, asc, eq, isNotNull, isNull, lt, or } from "drizzle-orm";
import { Database } from "../config/databaseConnection";
import { sessions } from "../schemas/sessions.schema";
import { NewSession, Session, SessionProvider, SessionSaver } from "../types/auth";
import { AuthError, ErrorKinds } from "../utils/errors";

export type SessionStore = SessionSaver & SessionProvider;

const sessionColumns = {
  sessionId: sessions.id,
  accountId: sessions.accountId,
  userAgent: sessions.userAgent,
  ipAddress: sessions.ipAddress,
  token: sessions.token,
  refreshToken: sessions.refreshToken,
  expiresAt: sessions.expiresAt,
  refreshExpiresAt: sessions.refreshExpiresAt,
  createdAt: sessions.createdAt,
};

/**
 * Session persistence on the `sessions` table. Revocation stamps `revoked_at`;
 * every read filters revoked rows out, so a revoked session behaves as absent.
 */
export const createSessionStore = (db: Database): SessionStore => {
  const findLive = async (op: string, where: SQL): Promise<Session> => {
    const [session] = await db
      .select(sessionColumns)
      .from(sessions)
      .where(and(where, isNull(sessions.revokedAt)))
      .limit(1);

    if (!session) {
      throw new AuthError(ErrorKinds.SESSION_NOT_FOUND, op);
    }
    return session;
  };

  return {
    saveSession: async (input: NewSession, signal?: AbortSignal) => {
      signal?.throwIfAborted();

      const [inserted] = await db
        .insert(sessions)
        .values({
          accountId: input.accountId,
          userAgent: input.userAgent,
          ipAddress: input.ipAddress,
          token: input.token,
          refreshToken: input.refreshToken,
          expiresAt: input.expiresAt,
          refreshExpiresAt: input.refreshExpiresAt,
        })
        .returning({ id: sessions.id });

      return inserted.id;
    },

    revokeSession: async (token: string, signal?: AbortSignal) => {
      signal?.throwIfAborted();

      await db
        .update(sessions)
        .set({ revokedAt: new Date() })
        .where(and(eq(sessions.token, token), isNull(sessions.revokedAt)));
    },

    pruneSessions: async (expiredBefore: Date, revokedBefore: Date, signal?: AbortSignal) => {
      signal?.throwIfAborted();

      // a live row goes only once neither its access token nor its refresh token can be used
      const deleted = await db
        .delete(sessions)
        .where(
          or(
            and(lt(sessions.refreshExpiresAt, expiredBefore), lt(sessions.expiresAt, expiredBefore)),
            and(isNotNull(sessions.revokedAt), lt(sessions.revokedAt, revokedBefore))
          )
        )
        .returning({ id: sessions.id });

      return deleted.length;
    },

    sessions: async (accountId: number, signal?: AbortSignal) => {
      signal?.throwIfAborted();

      return db
        .select(sessionColumns)
        .from(sessions)
        .where(and(eq(sessions.accountId, accountId), isNull(sessions.revokedAt)))
        .orderBy(asc(sessions.createdAt));
    },

    session: async (token: string, signal?: AbortSignal) => {
      signal?.throwIfAborted();
      return findLive("sessions.session", eq(sessions.token, token));
    },

    sessionByRefreshToken: async (refreshToken: string, signal?: AbortSignal) => {
      signal?.throwIfAborted();
      return findLive("sessions.sessionByRefreshToken", eq(sessions.refreshToken, refreshToken));
    },
  };
};
