import { Request, Response, NextFunction } from "express";
import { AuthService } from "../services/auth.service";
import { isAccountStatus } from "../types/role";
import { parseId, requestSignal } from "../utils/request";

export const createAccountController = (authService: AuthService) => {
  const changeStatus = async (req: Request, res: Response, next: NextFunction) => {
    const accountId = parseId(req.params.accountId);
    const status: unknown = req.body?.status;

    if (accountId === null) {
      return res.status(400).json({ message: "Invalid account ID" });
    }
    if (!isAccountStatus(status)) {
      return res.status(400).json({ message: "status is invalid" });
    }

    try {
      const updated = await authService.changeStatus(accountId, status, requestSignal(res));
      res.json({ success: true, data: { accountId, status: updated } });
    } catch (error) {
      next(error);
    }
  };

  return { changeStatus };
};
