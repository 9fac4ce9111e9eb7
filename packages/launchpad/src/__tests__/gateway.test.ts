import { describe, it, expect, vi } from "vitest";
import { z } from "zod";
import { createAuthContext, plaintextAuthorization } from "../auth.js";
import { RequestGateway, type FetchLike } from "../gateway.js";
import { RemoteRequestError } from "../errors.js";

const auth = createAuthContext({ username: "builder", token: "test-token", secret: "test-secret" });

function gatewayWith(respond: (url: string, init: RequestInit) => Response) {
  const fetchImpl = vi.fn<FetchLike>(async (url, init) => respond(url, init));
  const gateway = new RequestGateway({ baseUrl: "https://lp.test/devel", auth, fetch: fetchImpl });
  return { gateway, fetchImpl };
}

function headersOf(init: RequestInit | undefined): Headers {
  return new Headers(init?.headers);
}

describe("plaintextAuthorization", () => {
  it("formats the OAuth PLAINTEXT header", () => {
    expect(plaintextAuthorization("image.build", "test-token", "test-secret")).toBe(
      'OAuth oauth_version="1.0", oauth_signature_method="PLAINTEXT", ' +
        'oauth_consumer_key="image.build", oauth_token="test-token", oauth_signature="&test-secret"',
    );
  });

  it("uses the username as consumer key unless one is given", () => {
    expect(auth.authorization).toContain('oauth_consumer_key="builder"');
    const other = createAuthContext({
      username: "imagebuild",
      consumerKey: "image.build",
      token: "t",
      secret: "s",
    });
    expect(other.username).toBe("imagebuild");
    expect(other.authorization).toContain('oauth_consumer_key="image.build"');
  });
});

describe("RequestGateway", () => {
  it("signs every call and asks for JSON", async () => {
    const { gateway, fetchImpl } = gatewayWith(() => Response.json({}));
    await gateway.call("builders");

    const [url, init] = fetchImpl.mock.calls[0] ?? [];
    expect(url).toBe("https://lp.test/devel/builders");
    expect(init?.method).toBe("GET");
    expect(headersOf(init).get("authorization")).toBe(auth.authorization);
    expect(headersOf(init).get("accept")).toBe("application/json");
  });

  it("passes absolute links through unchanged", async () => {
    const { gateway, fetchImpl } = gatewayWith(() => Response.json({}));
    await gateway.call("https://lp.test/devel/~builder/+snap/abc", { params: { "ws.size": 6 } });

    expect(fetchImpl.mock.calls[0]?.[0]).toBe("https://lp.test/devel/~builder/+snap/abc?ws.size=6");
  });

  it("form-encodes bodies and repeats list values", async () => {
    const { gateway, fetchImpl } = gatewayWith(() => new Response(null, { status: 201 }));
    await gateway.call("+snaps", {
      method: "POST",
      body: { "ws.op": "new", processors: ["/+processors/amd64", "/+processors/s390x"], skipped: undefined },
    });

    const init = fetchImpl.mock.calls[0]?.[1];
    expect(headersOf(init).get("content-type")).toBe("application/x-www-form-urlencoded");
    const form = new URLSearchParams(String(init?.body));
    expect(form.get("ws.op")).toBe("new");
    expect(form.getAll("processors")).toEqual(["/+processors/amd64", "/+processors/s390x"]);
    expect(form.has("skipped")).toBe(false);
  });

  it("turns non-2xx answers into RemoteRequestError", async () => {
    const { gateway } = gatewayWith(() => new Response("No such snap", { status: 404 }));

    const err = await gateway.call("~builder/+snap/missing").catch((e: unknown) => e);
    expect(err).toBeInstanceOf(RemoteRequestError);
    if (err instanceof RemoteRequestError) {
      expect(err.statusCode).toBe(404);
      expect(err.body).toBe("No such snap");
      expect(err.method).toBe("GET");
      expect(err.url).toBe("https://lp.test/devel/~builder/+snap/missing");
    }
  });

  it("unwraps collection entries", async () => {
    const { gateway } = gatewayWith(() =>
      Response.json({ total_size: 2, entries: [{ name: "amd64" }, { name: "armhf" }] }),
    );
    const entries = await gateway.collection("processors", z.object({ name: z.string() }));
    expect(entries).toEqual([{ name: "amd64" }, { name: "armhf" }]);
  });

  it("treats a collection without entries as empty", async () => {
    const { gateway } = gatewayWith(() => Response.json({ total_size: 0 }));
    expect(await gateway.collection("processors", z.object({ name: z.string() }))).toEqual([]);
  });
});
