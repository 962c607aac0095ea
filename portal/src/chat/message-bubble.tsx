import { useMemo } from "react";
import { renderMarkdown } from "./markdown";
import type { MessageRole } from "./types";

interface MessageBubbleProps {
  role: MessageRole;
  content: string;
}

export function MessageBubble({ role, content }: MessageBubbleProps) {
  const html = useMemo(
    () => (role === "assistant" ? renderMarkdown(content) : ""),
    [role, content],
  );

  return (
    <article className={`message message-${role}`}>
      <span className="message-role">{role === "user" ? "You" : "Claude"}</span>
      {role === "assistant" ? (
        <div className="message-body markdown" dangerouslySetInnerHTML={{ __html: html }} />
      ) : (
        <div className="message-body plain">{content}</div>
      )}
    </article>
  );
}
