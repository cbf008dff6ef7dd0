declare global {
  namespace Express {
    interface AuthAccount {
      id: number;
      sessionId: string;
      token: string;
    }

    interface Request {
      account?: AuthAccount;
    }
  }
}

// Ensure this file is treated as a module
export {};
