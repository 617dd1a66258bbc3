import { Router } from "express";
import { z } from "zod";
import { sessionsRepo } from "../../db/repositories/sessions.repo";
import { interactionsRepo } from "../../db/repositories/interactions.repo";
import { profilesRepo } from "../../db/repositories/profiles.repo";

export const sessionsRoutes = Router();

const listQuerySchema = z.object({
  limit: z.coerce.number().int().positive().max(200).default(20),
  accountId: z.coerce.number().int().positive().optional(),
});

function parseStats(statsJson: string | null): unknown {
  return statsJson ? JSON.parse(statsJson) : null;
}

// Static/specific routes before /:id.

sessionsRoutes.get("/", async (req, res, next) => {
  try {
    const query = listQuerySchema.safeParse(req.query);
    if (!query.success) {
      res.status(400).json({ error: "Invalid query", issues: query.error.issues });
      return;
    }

    const sessions = await sessionsRepo.listRecent(query.data.limit, query.data.accountId);
    res.json(sessions.map((session) => ({ ...session, statsJson: undefined, stats: parseStats(session.statsJson) })));
  } catch (err) {
    next(err);
  }
});

sessionsRoutes.get("/:id/interactions", async (req, res, next) => {
  try {
    const id = parseInt(req.params.id, 10);
    if (isNaN(id)) {
      res.status(400).json({ error: "Invalid session ID" });
      return;
    }

    const session = await sessionsRepo.findById(id);
    if (!session) {
      res.status(404).json({ error: "Session not found" });
      return;
    }

    res.json(await interactionsRepo.listBySession(id));
  } catch (err) {
    next(err);
  }
});

sessionsRoutes.get("/:id/profiles", async (req, res, next) => {
  try {
    const id = parseInt(req.params.id, 10);
    if (isNaN(id)) {
      res.status(400).json({ error: "Invalid session ID" });
      return;
    }

    const session = await sessionsRepo.findById(id);
    if (!session) {
      res.status(404).json({ error: "Session not found" });
      return;
    }

    res.json(await profilesRepo.listBySession(id));
  } catch (err) {
    next(err);
  }
});

sessionsRoutes.get("/:id", async (req, res, next) => {
  try {
    const id = parseInt(req.params.id, 10);
    if (isNaN(id)) {
      res.status(400).json({ error: "Invalid session ID" });
      return;
    }

    const session = await sessionsRepo.findById(id);
    if (!session) {
      res.status(404).json({ error: "Session not found" });
      return;
    }

    res.json({ ...session, statsJson: undefined, stats: parseStats(session.statsJson) });
  } catch (err) {
    next(err);
  }
});
