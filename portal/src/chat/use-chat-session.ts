import { useCallback, useEffect, useReducer, useRef, useState } from "react";
import { isUnauthorized, type ChatApi } from "./api-client";
import { chatReducer, initialChatState, type ChatState } from "./chat-state";
import { outgoingMessage } from "./utils";

export type SessionStatus = "checking" | "signed-out" | "signed-in";

export interface ChatSessionController {
  readonly state: ChatState;
  readonly status: SessionStatus;
  readonly loginError: string;
  readonly sidebarError: string;
  readonly login: (credential: string) => Promise<void>;
  readonly logout: () => Promise<void>;
  readonly startNewConversation: () => void;
  readonly openConversation: (id: string) => Promise<void>;
  readonly renameConversation: (id: string, title: string) => Promise<void>;
  readonly deleteConversation: (id: string) => Promise<void>;
  /** `false` when the send was refused because another one is in flight. */
  readonly send: (message: string) => Promise<boolean>;
  readonly toggleSidebar: () => void;
}

export function useChatSession(api: ChatApi): ChatSessionController {
  const [state, dispatch] = useReducer(chatReducer, initialChatState);
  const [status, setStatus] = useState<SessionStatus>(() =>
    api.hasSession() ? "checking" : "signed-out",
  );
  const [loginError, setLoginError] = useState<string>("");
  const [sidebarError, setSidebarError] = useState<string>("");

  const inFlightRef = useRef(false);
  const conversationIdRef = useRef<string | null>(null);
  conversationIdRef.current = state.currentConversationId;

  const endSession = useCallback(() => {
    dispatch({ type: "sessionEnded" });
    setStatus("signed-out");
  }, []);

  /** Routes a 401 back to the login screen; otherwise returns the message. */
  const describeFailure = useCallback(
    (error: unknown): string => {
      if (isUnauthorized(error)) {
        endSession();
      }
      return error instanceof Error ? error.message : String(error);
    },
    [endSession],
  );

  const refreshConversations = useCallback(async () => {
    try {
      const conversations = await api.listConversations();
      dispatch({ type: "conversationsLoaded", conversations });
      setSidebarError("");
    } catch (error) {
      setSidebarError(describeFailure(error));
    }
  }, [api, describeFailure]);

  useEffect(() => {
    if (!api.hasSession()) {
      return;
    }
    let cancelled = false;

    const restore = async () => {
      try {
        const user = await api.me();
        if (cancelled) {
          return;
        }
        if (!user) {
          setStatus("signed-out");
          return;
        }
        dispatch({ type: "sessionStarted", user });
        setStatus("signed-in");
        await refreshConversations();
      } catch (error) {
        if (!cancelled) {
          setLoginError(describeFailure(error));
          setStatus("signed-out");
        }
      }
    };

    void restore();
    return () => {
      cancelled = true;
    };
  }, [api, describeFailure, refreshConversations]);

  const login = useCallback(
    async (credential: string) => {
      const trimmed = credential.trim();
      if (!trimmed) {
        setLoginError("Please enter your token");
        return;
      }
      setLoginError("");
      try {
        const user = await api.login(trimmed);
        dispatch({ type: "sessionStarted", user });
        setStatus("signed-in");
        await refreshConversations();
      } catch (error) {
        setLoginError(error instanceof Error ? error.message : String(error));
      }
    },
    [api, refreshConversations],
  );

  const logout = useCallback(async () => {
    try {
      await api.logout();
    } catch (error) {
      setLoginError(describeFailure(error));
    } finally {
      endSession();
    }
  }, [api, describeFailure, endSession]);

  const startNewConversation = useCallback(() => {
    dispatch({ type: "conversationCleared" });
  }, []);

  const openConversation = useCallback(
    async (id: string) => {
      try {
        const conversation = await api.getConversation(id);
        dispatch({ type: "conversationOpened", conversation });
        setSidebarError("");
      } catch (error) {
        setSidebarError(describeFailure(error));
      }
    },
    [api, describeFailure],
  );

  const renameConversation = useCallback(
    async (id: string, title: string) => {
      try {
        const conversation = await api.renameConversation(id, title);
        dispatch({ type: "conversationRenamed", conversation });
        setSidebarError("");
      } catch (error) {
        setSidebarError(describeFailure(error));
      }
    },
    [api, describeFailure],
  );

  const deleteConversation = useCallback(
    async (id: string) => {
      try {
        await api.deleteConversation(id);
        dispatch({ type: "conversationRemoved", conversationId: id });
        await refreshConversations();
      } catch (error) {
        setSidebarError(describeFailure(error));
      }
    },
    [api, describeFailure, refreshConversations],
  );

  const send = useCallback(
    async (message: string) => {
      const outgoing = outgoingMessage(message);
      if (outgoing === null || inFlightRef.current) {
        return false;
      }
      inFlightRef.current = true;
      dispatch({ type: "sendStarted", message: outgoing });

      try {
        const result = await api.sendMessage(outgoing, conversationIdRef.current);
        dispatch({
          type: "sendSucceeded",
          reply: result.reply,
          conversationId: result.conversationId,
        });
        await refreshConversations();
      } catch (error) {
        dispatch({ type: "sendFailed", error: describeFailure(error) });
      } finally {
        inFlightRef.current = false;
      }
      return true;
    },
    [api, describeFailure, refreshConversations],
  );

  const toggleSidebar = useCallback(() => {
    dispatch({ type: "sidebarToggled" });
  }, []);

  return {
    state,
    status,
    loginError,
    sidebarError,
    login,
    logout,
    startNewConversation,
    openConversation,
    renameConversation,
    deleteConversation,
    send,
    toggleSidebar,
  };
}
