import { Router } from "express";
import { createSessionController } from "../controllers/session.controller";
import { AuthMiddleware } from "../middlewares/auth.middleware";
import { AuthService } from "../services/auth.service";

export const createSessionRoutes = (authService: AuthService, auth: AuthMiddleware) => {
  const router = Router();
  const controller = createSessionController(authService);

  router.get("/", auth.requireAuth, controller.listActive);
  router.get("/validate", controller.validate);
  router.post("/revoke", controller.revoke);

  return router;
};
