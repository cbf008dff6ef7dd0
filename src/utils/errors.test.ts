import { AuthError, ErrorKinds, isAuthError, publicMessage, wrapError } from "./errors";

describe("AuthError", () => {
  it("should use the kind's message when there is no cause", () => {
    const error = new AuthError(ErrorKinds.SESSION_NOT_FOUND, "sessions.session");

    expect(error.message).toBe("sessions.session: session not found");
    expect(error.status).toBe(401);
    expect(error.cause).toBeUndefined();
  });

  it("should chain the cause message after the operation", () => {
    const cause = new Error("connection reset");
    const error = new AuthError(ErrorKinds.PERSISTENCE_FAILURE, "accounts.saveAccount", cause);

    expect(error.message).toBe("accounts.saveAccount: connection reset");
    expect(error.cause).toBe(cause);
    expect(error.status).toBe(500);
  });
});

describe("wrapError", () => {
  it("should keep the kind of an already classified failure", () => {
    const inner = new AuthError(ErrorKinds.ACCOUNT_NOT_FOUND, "accounts.accountById");

    const wrapped = wrapError("Auth.ChangePassword", inner, ErrorKinds.PERSISTENCE_FAILURE);

    expect(wrapped.kind).toBe(ErrorKinds.ACCOUNT_NOT_FOUND);
    expect(wrapped.op).toBe("Auth.ChangePassword");
    expect(wrapped.message).toBe("Auth.ChangePassword: accounts.accountById: account not found");
  });

  it("should apply the fallback kind to unclassified failures", () => {
    const wrapped = wrapError("Auth.Login", new Error("bad key"), ErrorKinds.TOKEN_GENERATION_FAILURE);

    expect(wrapped.kind).toBe(ErrorKinds.TOKEN_GENERATION_FAILURE);
    expect(wrapped.message).toBe("Auth.Login: bad key");
  });

  it("should report CANCELLED whenever the signal was aborted", () => {
    const controller = new AbortController();
    controller.abort();
    const inner = new AuthError(ErrorKinds.ACCOUNT_NOT_FOUND, "accounts.accountById");

    const wrapped = wrapError("Auth.Logout", inner, ErrorKinds.PERSISTENCE_FAILURE, controller.signal);

    expect(wrapped.kind).toBe(ErrorKinds.CANCELLED);
    expect(wrapped.status).toBe(499);
  });

  it("should fall back to the kind's message for non-Error values", () => {
    const wrapped = wrapError("Auth.IsAdmin", "boom", ErrorKinds.PERSISTENCE_FAILURE);

    expect(wrapped.message).toBe("Auth.IsAdmin: storage failure");
  });
});

describe("isAuthError", () => {
  it("should match by kind when one is given", () => {
    const error = new AuthError(ErrorKinds.TOKEN_EXPIRED, "Auth.Authenticate");

    expect(isAuthError(error)).toBe(true);
    expect(isAuthError(error, ErrorKinds.TOKEN_EXPIRED)).toBe(true);
    expect(isAuthError(error, ErrorKinds.SESSION_NOT_FOUND)).toBe(false);
    expect(isAuthError(new Error("token expired"))).toBe(false);
  });
});

describe("publicMessage", () => {
  it("should hide the cause chain", () => {
    const error = wrapError(
      "Auth.Login",
      new Error('relation "accounts" does not exist'),
      ErrorKinds.PERSISTENCE_FAILURE
    );

    expect(publicMessage(error)).toBe("storage failure");
  });
});
