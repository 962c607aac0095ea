import { useState, type FormEvent } from "react";

interface LoginScreenProps {
  error: string;
  onLogin: (credential: string) => Promise<void>;
}

export function LoginScreen({ error, onLogin }: LoginScreenProps) {
  const [credential, setCredential] = useState<string>("");
  const [submitting, setSubmitting] = useState<boolean>(false);

  const onSubmit = async (event: FormEvent) => {
    event.preventDefault();
    setSubmitting(true);
    try {
      await onLogin(credential);
    } finally {
      setSubmitting(false);
    }
  };

  return (
    <main className="login-screen">
      <form className="login-card panel" onSubmit={(event) => void onSubmit(event)}>
        <h1>Relay Chat</h1>
        <p className="muted">
          Sign in with an Anthropic API key or a Claude Code OAuth token.
        </p>
        <label>
          Token
          <input
            type="password"
            autoComplete="off"
            value={credential}
            onChange={(event) => setCredential(event.target.value)}
            placeholder="sk-ant-..."
            disabled={submitting}
          />
        </label>
        {error ? <p className="error-text">{error}</p> : null}
        <button type="submit" disabled={submitting}>
          {submitting ? "Signing in..." : "Sign in"}
        </button>
      </form>
    </main>
  );
}
