import { describe, expect, it } from "vitest";
import { VoiceSessionStore } from "./sessionStore.js";

function clock(start = 1_000) {
  let now = start;
  return {
    now: () => now,
    advance: (ms: number) => {
      now += ms;
    },
  };
}

describe("VoiceSessionStore", () => {
  it("keeps one voice per session", () => {
    const store = new VoiceSessionStore(60_000);

    store.set("session-a", "voice-1");
    store.set("session-b", "voice-2");

    expect(store.get("session-a")?.voiceId).toBe("voice-1");
    expect(store.get("session-b")?.voiceId).toBe("voice-2");
  });

  it("replaces the voice when a session clones again", () => {
    const store = new VoiceSessionStore(60_000);

    store.set("session-a", "voice-1");
    store.set("session-a", "voice-3");

    expect(store.get("session-a")?.voiceId).toBe("voice-3");
    expect(store.size).toBe(1);
  });

  it("expires sessions after the ttl", () => {
    const time = clock();
    const store = new VoiceSessionStore(1_000, time.now);

    expect(store.set("session-a", "voice-1")).toEqual({
      voiceId: "voice-1",
      createdAt: 1_000,
      expiresAt: 2_000,
    });

    time.advance(999);
    expect(store.get("session-a")?.voiceId).toBe("voice-1");

    time.advance(1);
    expect(store.get("session-a")).toBeUndefined();
    expect(store.size).toBe(0);
  });

  it("prunes only expired sessions", () => {
    const time = clock();
    const store = new VoiceSessionStore(1_000, time.now);

    store.set("old", "voice-1");
    time.advance(500);
    store.set("new", "voice-2");
    time.advance(600);

    expect(store.prune()).toBe(1);
    expect(store.get("old")).toBeUndefined();
    expect(store.get("new")?.voiceId).toBe("voice-2");
  });
});
