import { Router } from "express";
import { createAccountController } from "../controllers/account.controller";
import { AuthMiddleware } from "../middlewares/auth.middleware";
import { AuthService } from "../services/auth.service";

export const createAccountRoutes = (authService: AuthService, auth: AuthMiddleware) => {
  const router = Router();
  const controller = createAccountController(authService);

  // 🔐 ADMIN ONLY
  router.patch("/:accountId/status", auth.requireAuth, auth.requireAdmin, controller.changeStatus);

  return router;
};
