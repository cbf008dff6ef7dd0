import { eq } from "drizzle-orm";
import { Database } from "../config/databaseConnection";
import { apps } from "../schemas/apps.schema";
import { AppProvider } from "../types/auth";
import { AuthError, ErrorKinds } from "../utils/errors";

export const createAppStore = (db: Database): AppProvider => ({
  app: async (appId: number, signal?: AbortSignal) => {
    signal?.throwIfAborted();

    const [app] = await db
      .select({
        id: apps.id,
        name: apps.name,
        secret: apps.secret,
        tokenTTL: apps.tokenTTL,
        refreshTokenTTL: apps.refreshTokenTTL,
        redirectURL: apps.redirectURL,
      })
      .from(apps)
      .where(eq(apps.id, appId))
      .limit(1);

    if (!app) {
      throw new AuthError(ErrorKinds.APP_NOT_FOUND, "apps.app");
    }
    return app;
  },
});
