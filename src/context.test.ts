import { describe, test, expect } from '@jest/globals';
import { getVerifiedIdentity, withIdentity } from "./context.js";
import { VerifiedIdentity } from "./auth/types.js";

describe("context", () => {
  const alice: VerifiedIdentity = {
    subject: "alice",
    clientId: "desktop-client",
    scopes: ["mcp"],
  };

  test("getVerifiedIdentity throws when called outside context", () => {
    expect(() => getVerifiedIdentity()).toThrow(
      "No request context found - are you calling this from within a request handler?"
    );
  });

  test("returns the identity within context", async () => {
    await withIdentity(alice, async () => {
      await Promise.resolve();
      expect(getVerifiedIdentity()).toEqual(alice);
    });
  });

  test("nested contexts maintain isolation", async () => {
    const bob: VerifiedIdentity = { subject: "bob", clientId: "cli", scopes: ["mcp"] };

    await withIdentity(alice, async () => {
      expect(getVerifiedIdentity().subject).toBe("alice");

      await withIdentity(bob, async () => {
        expect(getVerifiedIdentity().subject).toBe("bob");
      });

      expect(getVerifiedIdentity().subject).toBe("alice");
    });
  });

  test("concurrent requests see their own identity", async () => {
    const bob: VerifiedIdentity = { subject: "bob", clientId: "cli", scopes: ["mcp"] };
    const seen: string[] = [];

    await Promise.all([
      withIdentity(alice, async () => {
        await new Promise((resolve) => setTimeout(resolve, 10));
        seen.push(getVerifiedIdentity().subject);
      }),
      withIdentity(bob, async () => {
        seen.push(getVerifiedIdentity().subject);
      }),
    ]);

    expect(seen).toEqual(["bob", "alice"]);
  });
});
