import { Router } from "express";
import { AuthControllerOptions, createAuthController } from "../controllers/auth.controller";
import { AuthMiddleware } from "../middlewares/auth.middleware";
import { AuthService } from "../services/auth.service";

export const createAuthRoutes = (
  authService: AuthService,
  auth: AuthMiddleware,
  options: AuthControllerOptions
) => {
  const router = Router();
  const controller = createAuthController(authService, options);

  router.post("/register", auth.optionalAuth, controller.register);
  router.post("/login", controller.login);
  router.post("/refresh", controller.refresh);
  router.post("/logout", auth.requireAuth, controller.logout);
  router.put("/change-password", auth.requireAuth, controller.changePassword);

  return router;
};
