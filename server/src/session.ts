export const SESSION_HEADER = "Mcp-Session-Id";

export type SessionState =
  | { kind: "none" }
  | { kind: "active"; token: string };

/**
 * Holds the single session token the remote issued. Only an explicit
 * "not found" clears it; transport failures leave it alone.
 */
export class SessionTracker {
  private state: SessionState = { kind: "none" };

  get current(): SessionState {
    return this.state;
  }

  get token(): string | null {
    return this.state.kind === "active" ? this.state.token : null;
  }

  /** Returns true when the token changed. */
  observe(token: string): boolean {
    const changed = this.token !== token;
    this.state = { kind: "active", token };
    return changed;
  }

  /** Returns true when a live session was dropped. */
  expire(): boolean {
    const wasActive = this.state.kind === "active";
    this.state = { kind: "none" };
    return wasActive;
  }

  headers(): Record<string, string> {
    const token = this.token;
    return token ? { [SESSION_HEADER]: token } : {};
  }
}
