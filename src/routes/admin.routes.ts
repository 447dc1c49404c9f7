import { Router } from "express";
import { createAdminController } from "../controllers/admin.controller";
import { requireApiKey } from "../middleware/apiKey";
import { Services } from "../services/container";

export const createAdminRoutes = (services: Services, adminApiKey: string) => {
  const router = Router();
  const admin = createAdminController(services);

  router.use(requireApiKey(adminApiKey));

  // Whitelist
  router.get("/whitelist", admin.listWhitelist);
  router.get("/whitelist/stats", admin.whitelistStats);
  router.post("/whitelist", admin.addToWhitelist);
  router.delete("/whitelist/:phone", admin.removeFromWhitelist);

  // Users
  router.get("/users/:phone", admin.getUser);
  router.get("/users/:phone/usage", admin.getUsage);

  return router;
};
