import { Router, type RequestHandler } from "express";
import { z } from "zod";
import { NotFoundError } from "../errors.js";
import { requireAuth } from "../middleware/session-auth.js";
import type { ConversationRepository } from "../repositories/conversation-repository.js";
import {
  toConversationDetail,
  toConversationSummary,
} from "./serializers.js";
import { parseBody } from "./validation.js";

const TITLE_MAX_LENGTH = 200;

const createConversationSchema = z.object({
  title: z.string().trim().max(TITLE_MAX_LENGTH, "Title is too long").optional(),
});

const renameConversationSchema = z.object({
  title: z
    .string()
    .trim()
    .min(1, "Title is required")
    .max(TITLE_MAX_LENGTH, "Title is too long")
    .default(""),
});

export function createConversationsRouter(input: {
  conversations: ConversationRepository;
  requireSession: RequestHandler;
}): Router {
  const { conversations, requireSession } = input;
  const router = Router();

  router.use("/conversations", requireSession);

  router.get("/conversations", async (req, res) => {
    const { user } = requireAuth(req);
    const items = await conversations.listConversations(user.id);
    res.json({
      success: true,
      conversations: items.map(toConversationSummary),
    });
  });

  router.post("/conversations", async (req, res) => {
    const { user } = requireAuth(req);
    const body = parseBody(createConversationSchema, req.body);
    const created = await conversations.createConversation(user.id, body.title);
    res.status(201).json({
      success: true,
      conversation: toConversationSummary(created),
    });
  });

  router.get("/conversations/:id", async (req, res) => {
    const { user } = requireAuth(req);
    const conversation = await conversations.getConversation(user.id, req.params.id);
    if (!conversation) {
      throw new NotFoundError();
    }
    res.json({
      success: true,
      conversation: toConversationDetail(conversation),
    });
  });

  router.patch("/conversations/:id", async (req, res) => {
    const { user } = requireAuth(req);
    const body = parseBody(renameConversationSchema, req.body);
    const renamed = await conversations.renameConversation(
      user.id,
      req.params.id,
      body.title,
    );
    if (!renamed) {
      throw new NotFoundError();
    }
    res.json({
      success: true,
      conversation: toConversationSummary(renamed),
    });
  });

  router.delete("/conversations/:id", async (req, res) => {
    const { user } = requireAuth(req);
    const deleted = await conversations.deleteConversation(user.id, req.params.id);
    if (!deleted) {
      throw new NotFoundError();
    }
    res.json({ success: true });
  });

  return router;
}
