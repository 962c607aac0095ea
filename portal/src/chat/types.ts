import { z } from "zod";

export const userSummarySchema = z.object({
  id: z.string(),
  email: z.string().nullable(),
  name: z.string().nullable(),
  created_at: z.string(),
});

export const conversationSummarySchema = z.object({
  id: z.string(),
  title: z.string(),
  created_at: z.string(),
  updated_at: z.string(),
});

export const storedMessageSchema = z.object({
  id: z.string(),
  role: z.enum(["user", "assistant"]),
  content: z.string(),
  created_at: z.string(),
});

export const conversationDetailSchema = conversationSummarySchema.extend({
  messages: z.array(storedMessageSchema),
});

export const loginResponseSchema = z.object({
  success: z.literal(true),
  user: userSummarySchema,
  session_token: z.string().min(1),
  expires_at: z.string(),
});

export const meResponseSchema = z.object({
  authenticated: z.boolean(),
  user: userSummarySchema.optional(),
});

export const successResponseSchema = z.object({
  success: z.literal(true),
});

export const conversationListResponseSchema = z.object({
  success: z.literal(true),
  conversations: z.array(conversationSummarySchema),
});

export const conversationResponseSchema = z.object({
  success: z.literal(true),
  conversation: conversationSummarySchema,
});

export const conversationDetailResponseSchema = z.object({
  success: z.literal(true),
  conversation: conversationDetailSchema,
});

export const chatResponseSchema = z.object({
  success: z.literal(true),
  response: z.string(),
  conversation_id: z.string(),
});

export const errorBodySchema = z.object({
  success: z.literal(false),
  error: z.string(),
});

export type UserSummary = z.infer<typeof userSummarySchema>;
export type ConversationSummary = z.infer<typeof conversationSummarySchema>;
export type StoredMessage = z.infer<typeof storedMessageSchema>;
export type ConversationDetail = z.infer<typeof conversationDetailSchema>;
export type MessageRole = StoredMessage["role"];

export interface ChatMessage {
  readonly role: MessageRole;
  readonly content: string;
}

export interface ChatReply {
  readonly reply: string;
  readonly conversationId: string;
}
