import { Router, type RequestHandler } from "express";
import { z } from "zod";
import { requireAuth } from "../middleware/session-auth.js";
import type { ChatService } from "../services/chat-service.js";
import { parseBody } from "./validation.js";

const chatSchema = z.object({
  message: z
    .string()
    .refine((value) => value.trim().length > 0, "No message provided")
    .default(""),
  conversation_id: z.string().trim().nullish(),
});

export function createChatRouter(input: {
  chat: ChatService;
  requireSession: RequestHandler;
}): Router {
  const router = Router();

  router.post("/chat", input.requireSession, async (req, res) => {
    const { user, session } = requireAuth(req);
    const body = parseBody(chatSchema, req.body);

    const result = await input.chat.sendMessage({
      userId: user.id,
      message: body.message,
      conversationId: body.conversation_id || null,
      credential: session.credential,
    });

    res.json({
      success: true,
      response: result.reply,
      conversation_id: result.conversationId,
    });
  });

  return router;
}
