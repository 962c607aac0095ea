import type {
  ChatMessage,
  ConversationDetail,
  ConversationSummary,
  UserSummary,
} from "./types";

export interface ChatState {
  readonly user: UserSummary | null;
  /** Server order; never re-sorted here. */
  readonly conversations: readonly ConversationSummary[];
  readonly currentConversationId: string | null;
  readonly history: readonly ChatMessage[];
  /** The message of the send in flight, shown until the reply lands. */
  readonly pendingMessage: string | null;
  readonly isLoading: boolean;
  readonly sendError: string | null;
  readonly sidebarOpen: boolean;
}

export type ChatAction =
  | { readonly type: "sessionStarted"; readonly user: UserSummary }
  | { readonly type: "sessionEnded" }
  | {
      readonly type: "conversationsLoaded";
      readonly conversations: readonly ConversationSummary[];
    }
  | { readonly type: "conversationOpened"; readonly conversation: ConversationDetail }
  | { readonly type: "conversationCleared" }
  | { readonly type: "conversationRenamed"; readonly conversation: ConversationSummary }
  | { readonly type: "conversationRemoved"; readonly conversationId: string }
  | { readonly type: "sendStarted"; readonly message: string }
  | {
      readonly type: "sendSucceeded";
      readonly reply: string;
      readonly conversationId: string;
    }
  | { readonly type: "sendFailed"; readonly error: string }
  | { readonly type: "sidebarToggled" };

export const initialChatState: ChatState = {
  user: null,
  conversations: [],
  currentConversationId: null,
  history: [],
  pendingMessage: null,
  isLoading: false,
  sendError: null,
  sidebarOpen: true,
};

export function chatReducer(state: ChatState, action: ChatAction): ChatState {
  switch (action.type) {
    case "sessionStarted":
      return { ...initialChatState, sidebarOpen: state.sidebarOpen, user: action.user };

    case "sessionEnded":
      return { ...initialChatState, sidebarOpen: state.sidebarOpen };

    case "conversationsLoaded":
      return { ...state, conversations: action.conversations };

    case "conversationOpened":
      if (state.isLoading) {
        return state;
      }
      return {
        ...state,
        currentConversationId: action.conversation.id,
        history: action.conversation.messages.map(({ role, content }) => ({
          role,
          content,
        })),
        sendError: null,
      };

    case "conversationCleared":
      if (state.isLoading) {
        return state;
      }
      return { ...state, currentConversationId: null, history: [], sendError: null };

    case "conversationRenamed":
      return {
        ...state,
        conversations: state.conversations.map((conversation) =>
          conversation.id === action.conversation.id ? action.conversation : conversation,
        ),
      };

    case "conversationRemoved": {
      const conversations = state.conversations.filter(
        (conversation) => conversation.id !== action.conversationId,
      );
      if (state.currentConversationId !== action.conversationId) {
        return { ...state, conversations };
      }
      return { ...state, conversations, currentConversationId: null, history: [] };
    }

    case "sendStarted":
      if (state.isLoading) {
        return state;
      }
      return {
        ...state,
        pendingMessage: action.message,
        isLoading: true,
        sendError: null,
      };

    case "sendSucceeded":
      if (!state.isLoading || state.pendingMessage === null) {
        return state;
      }
      return {
        ...state,
        currentConversationId: action.conversationId,
        history: [
          ...state.history,
          { role: "user", content: state.pendingMessage },
          { role: "assistant", content: action.reply },
        ],
        pendingMessage: null,
        isLoading: false,
      };

    case "sendFailed":
      return {
        ...state,
        pendingMessage: null,
        isLoading: false,
        sendError: action.error,
      };

    case "sidebarToggled":
      return { ...state, sidebarOpen: !state.sidebarOpen };
  }
}
