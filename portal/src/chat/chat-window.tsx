import { useEffect, useRef, useState, type FormEvent, type KeyboardEvent } from "react";
import type { ChatState } from "./chat-state";
import { MessageBubble } from "./message-bubble";
import { pickThinkingPhrase } from "./utils";

const PHRASE_ROTATION_MS = 2500;

interface ChatWindowProps {
  state: ChatState;
  onSend: (message: string) => Promise<boolean>;
  onToggleSidebar: () => void;
  onLogout: () => Promise<void>;
}

export function ChatWindow({ state, onSend, onToggleSidebar, onLogout }: ChatWindowProps) {
  const [draft, setDraft] = useState<string>("");
  const [phrase, setPhrase] = useState<string>(() => pickThinkingPhrase());
  const scrollRef = useRef<HTMLDivElement | null>(null);

  useEffect(() => {
    if (!state.isLoading) {
      return;
    }
    setPhrase(pickThinkingPhrase());
    const timer = window.setInterval(() => {
      setPhrase(pickThinkingPhrase());
    }, PHRASE_ROTATION_MS);
    return () => window.clearInterval(timer);
  }, [state.isLoading]);

  useEffect(() => {
    const node = scrollRef.current;
    if (node) {
      node.scrollTop = node.scrollHeight;
    }
  }, [state.history, state.pendingMessage, state.sendError]);

  const submit = async () => {
    const message = draft;
    if (!message.trim() || state.isLoading) {
      return;
    }
    setDraft("");
    await onSend(message);
  };

  const onSubmit = (event: FormEvent) => {
    event.preventDefault();
    void submit();
  };

  const onKeyDown = (event: KeyboardEvent<HTMLTextAreaElement>) => {
    if (event.key === "Enter" && !event.shiftKey && !event.nativeEvent.isComposing) {
      event.preventDefault();
      void submit();
    }
  };

  const empty = state.history.length === 0 && state.pendingMessage === null;

  return (
    <section className="chat-window">
      <header className="chat-header">
        <button type="button" className="icon" title="Toggle sidebar" onClick={onToggleSidebar}>
          ☰
        </button>
        <h1>Relay Chat</h1>
        <div className="chat-header-user">
          <span className="muted">{state.user?.name ?? state.user?.email ?? "Signed in"}</span>
          <button type="button" className="secondary" onClick={() => void onLogout()}>
            Log out
          </button>
        </div>
      </header>

      <div className="message-list" ref={scrollRef}>
        {empty ? (
          <div className="welcome">
            <h2>How can I help you today?</h2>
            <p className="muted">Replies come from Claude Code running on the server.</p>
          </div>
        ) : null}
        {state.history.map((message, index) => (
          <MessageBubble key={index} role={message.role} content={message.content} />
        ))}
        {state.pendingMessage !== null ? (
          <MessageBubble role="user" content={state.pendingMessage} />
        ) : null}
        {state.isLoading ? (
          <div className="thinking" aria-live="polite">
            <span className="thinking-dot" />
            {phrase}...
          </div>
        ) : null}
        {state.sendError ? <p className="error-text message-error">{state.sendError}</p> : null}
      </div>

      <form className="composer" onSubmit={onSubmit}>
        <textarea
          value={draft}
          onChange={(event) => setDraft(event.target.value)}
          onKeyDown={onKeyDown}
          placeholder="Message Claude... (Enter to send, Shift+Enter for a new line)"
          rows={3}
        />
        <button type="submit" disabled={state.isLoading || !draft.trim()}>
          Send
        </button>
      </form>
    </section>
  );
}
