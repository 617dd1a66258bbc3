import { Router } from "express";
import { z } from "zod";
import { accountsRepo } from "../../db/repositories/accounts.repo";
import { interactionsRepo } from "../../db/repositories/interactions.repo";

export const accountsRoutes = Router();

const interactionsQuerySchema = z.object({
  limit: z.coerce.number().int().positive().max(500).default(50),
});

accountsRoutes.get("/", async (_req, res, next) => {
  try {
    res.json(await accountsRepo.list());
  } catch (err) {
    next(err);
  }
});

accountsRoutes.get("/:id/interactions", async (req, res, next) => {
  try {
    const id = parseInt(req.params.id, 10);
    if (isNaN(id)) {
      res.status(400).json({ error: "Invalid account ID" });
      return;
    }

    const query = interactionsQuerySchema.safeParse(req.query);
    if (!query.success) {
      res.status(400).json({ error: "Invalid query", issues: query.error.issues });
      return;
    }

    const account = await accountsRepo.findById(id);
    if (!account) {
      res.status(404).json({ error: "Account not found" });
      return;
    }

    res.json(await interactionsRepo.listByAccount(id, query.data.limit));
  } catch (err) {
    next(err);
  }
});

accountsRoutes.get("/:id", async (req, res, next) => {
  try {
    const id = parseInt(req.params.id, 10);
    if (isNaN(id)) {
      res.status(400).json({ error: "Invalid account ID" });
      return;
    }

    const account = await accountsRepo.findById(id);
    if (!account) {
      res.status(404).json({ error: "Account not found" });
      return;
    }

    res.json(account);
  } catch (err) {
    next(err);
  }
});
