import express from "express";
import { createSmsController } from "../controllers/sms.controller";
import { Services } from "../services/container";

export const createSmsRoutes = (services: Services) => {
  const router = express.Router();
  const { receiveInbound } = createSmsController(services);

  // ClickSend inbound webhook (no auth)
  router.post("/inbound", receiveInbound);

  return router;
};
