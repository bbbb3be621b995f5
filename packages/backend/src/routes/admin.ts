import express from "express";
import { z } from "zod";

import type { EscrowService } from "../services/escrowService.js";

export function createAdminRouter(escrowService: EscrowService) {
  const router = express.Router();

  router.get("/primary-token", (_req, res) => {
    res.json({ address: escrowService.getPrimaryTokenAddress() });
  });

  router.put("/primary-token", async (req, res, next) => {
    try {
      const schema = z.object({ caller: z.string(), address: z.string() });
      const parsed = schema.parse(req.body);
      const address = await escrowService.setPrimaryTokenAddress(parsed.caller, parsed.address);
      res.json({ address });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
