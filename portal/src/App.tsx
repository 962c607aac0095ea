import { useMemo } from "react";
import { createApiClient } from "./chat/api-client";
import { ChatWindow } from "./chat/chat-window";
import { ConversationSidebar } from "./chat/conversation-sidebar";
import { LoginScreen } from "./chat/login-screen";
import { useChatSession } from "./chat/use-chat-session";

const API_BASE = (import.meta.env.VITE_API_BASE ?? "").trim();

export default function App() {
  const api = useMemo(
    () => createApiClient({ baseUrl: API_BASE, storage: window.localStorage }),
    [],
  );
  const session = useChatSession(api);
  const { state } = session;

  if (session.status === "checking") {
    return (
      <main className="boot-screen">
        <p className="muted">Restoring your session...</p>
      </main>
    );
  }

  if (session.status === "signed-out") {
    return <LoginScreen error={session.loginError} onLogin={session.login} />;
  }

  return (
    <div className={`chat-shell ${state.sidebarOpen ? "" : "sidebar-collapsed"}`}>
      {state.sidebarOpen ? (
        <ConversationSidebar
          conversations={state.conversations}
          activeId={state.currentConversationId}
          busy={state.isLoading}
          error={session.sidebarError}
          onNew={session.startNewConversation}
          onSelect={session.openConversation}
          onRename={session.renameConversation}
          onDelete={session.deleteConversation}
        />
      ) : null}
      <ChatWindow
        state={state}
        onSend={session.send}
        onToggleSidebar={session.toggleSidebar}
        onLogout={session.logout}
      />
    </div>
  );
}
