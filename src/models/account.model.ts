import { SQL, eq } from "drizzle-orm";
import { Database } from "../config/databaseConnection";
import { accounts } from "../schemas/accounts.schema";
import { Account, AccountProvider, AccountSaver, NewAccount } from "../types/auth";
import { AccountStatus } from "../types/role";
import { AuthError, ErrorKinds } from "../utils/errors";
import { isUniqueViolation } from "./storeErrors";

export type AccountStore = AccountSaver & AccountProvider;

const accountColumns = {
  id: accounts.id,
  email: accounts.email,
  passHash: accounts.passHash,
  role: accounts.role,
  status: accounts.status,
  appId: accounts.appId,
};

/**
 * Account persistence on the `accounts` table. Emails are stored lower-cased;
 * lookups normalise the same way.
 */
export const createAccountStore = (db: Database): AccountStore => {
  const findOne = async (op: string, where: SQL): Promise<Account> => {
    const [account] = await db.select(accountColumns).from(accounts).where(where).limit(1);

    if (!account) {
      throw new AuthError(ErrorKinds.ACCOUNT_NOT_FOUND, op);
    }
    return account;
  };

  return {
    saveAccount: async (input: NewAccount, signal?: AbortSignal) => {
      signal?.throwIfAborted();

      try {
        const [inserted] = await db
          .insert(accounts)
          .values({
            email: input.email.toLowerCase().trim(),
            passHash: input.passHash,
            role: input.role,
            status: input.status,
            appId: input.appId,
          })
          .returning({ id: accounts.id });

        return inserted.id;
      } catch (error) {
        if (isUniqueViolation(error)) {
          throw new AuthError(ErrorKinds.ACCOUNT_EXISTS, "accounts.saveAccount");
        }
        throw error;
      }
    },

    updatePassword: async (accountId: number, passHash: string, signal?: AbortSignal) => {
      signal?.throwIfAborted();

      const updated = await db
        .update(accounts)
        .set({ passHash })
        .where(eq(accounts.id, accountId))
        .returning({ id: accounts.id });

      if (updated.length === 0) {
        throw new AuthError(ErrorKinds.ACCOUNT_NOT_FOUND, "accounts.updatePassword");
      }
    },

    updateStatus: async (accountId: number, status: AccountStatus, signal?: AbortSignal) => {
      signal?.throwIfAborted();

      const updated = await db
        .update(accounts)
        .set({ status })
        .where(eq(accounts.id, accountId))
        .returning({ id: accounts.id });

      if (updated.length === 0) {
        throw new AuthError(ErrorKinds.ACCOUNT_NOT_FOUND, "accounts.updateStatus");
      }
    },

    accountByEmail: async (email: string, signal?: AbortSignal) => {
      signal?.throwIfAborted();
      return findOne("accounts.accountByEmail", eq(accounts.email, email.toLowerCase().trim()));
    },

    accountById: async (accountId: number, signal?: AbortSignal) => {
      signal?.throwIfAborted();
      return findOne("accounts.accountById", eq(accounts.id, accountId));
    },

    isAdmin: async (accountId: number, signal?: AbortSignal) => {
      signal?.throwIfAborted();
      const account = await findOne("accounts.isAdmin", eq(accounts.id, accountId));
      return account.role === "admin";
    },
  };
};
