import { useState, type FormEvent } from "react";
import type { ConversationSummary } from "./types";
import { formatConversationDate } from "./utils";

interface ConversationSidebarProps {
  conversations: readonly ConversationSummary[];
  activeId: string | null;
  busy: boolean;
  error: string;
  onNew: () => void;
  onSelect: (id: string) => Promise<void>;
  onRename: (id: string, title: string) => Promise<void>;
  onDelete: (id: string) => Promise<void>;
}

export function ConversationSidebar(input: ConversationSidebarProps) {
  const { conversations, activeId, busy, error, onNew, onSelect, onRename, onDelete } =
    input;
  const [editingId, setEditingId] = useState<string | null>(null);
  const [draftTitle, setDraftTitle] = useState<string>("");

  const beginRename = (conversation: ConversationSummary) => {
    setEditingId(conversation.id);
    setDraftTitle(conversation.title);
  };

  const submitRename = async (event: FormEvent, id: string) => {
    event.preventDefault();
    const title = draftTitle.trim();
    setEditingId(null);
    if (title) {
      await onRename(id, title);
    }
  };

  const confirmDelete = async (conversation: ConversationSummary) => {
    if (window.confirm(`Delete "${conversation.title}"?`)) {
      await onDelete(conversation.id);
    }
  };

  return (
    <aside className="sidebar panel">
      <div className="sidebar-header">
        <h2>Conversations</h2>
        <button type="button" className="secondary" onClick={onNew} disabled={busy}>
          New chat
        </button>
      </div>
      {error ? <p className="error-text panel-error">{error}</p> : null}
      <nav className="conversation-list">
        {conversations.length === 0 ? (
          <p className="muted">No conversations yet</p>
        ) : (
          conversations.map((conversation) =>
            conversation.id === editingId ? (
              <form
                key={conversation.id}
                className="conversation-item editing"
                onSubmit={(event) => void submitRename(event, conversation.id)}
              >
                <input
                  value={draftTitle}
                  onChange={(event) => setDraftTitle(event.target.value)}
                  onBlur={() => setEditingId(null)}
                  maxLength={200}
                  autoFocus
                />
              </form>
            ) : (
              <div
                key={conversation.id}
                className={`conversation-item ${conversation.id === activeId ? "active" : ""}`}
              >
                <button
                  type="button"
                  className="conversation-open"
                  onClick={() => void onSelect(conversation.id)}
                  disabled={busy}
                >
                  <span className="conversation-title">{conversation.title}</span>
                  <span className="conversation-date">
                    {formatConversationDate(conversation.updated_at)}
                  </span>
                </button>
                <div className="conversation-actions">
                  <button
                    type="button"
                    className="icon"
                    title="Rename"
                    onClick={() => beginRename(conversation)}
                    disabled={busy}
                  >
                    ✎
                  </button>
                  <button
                    type="button"
                    className="icon"
                    title="Delete"
                    onClick={() => void confirmDelete(conversation)}
                    disabled={busy}
                  >
                    ×
                  </button>
                </div>
              </div>
            ),
          )
        )}
      </nav>
    </aside>
  );
}
