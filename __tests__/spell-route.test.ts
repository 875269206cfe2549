import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import { POST } from "@/app/api/spell/v1/check/route";
import { setSharedCorrector } from "@/lib/spell/bridge";
import { SpellCorrector } from "@/lib/spell/corrector";
import { WordFrequency } from "@/lib/spell/word-frequency";

function jsonRequest(body: unknown, contentType = "application/json") {
  return new Request("http://localhost/api/spell/v1/check", {
    method: "POST",
    headers: { "Content-Type": contentType },
    body: typeof body === "string" ? body : JSON.stringify(body),
  });
}

beforeEach(() => {
  const wf = new WordFrequency();
  wf.addMany({ the: 10, cat: 4, sat: 2 });
  setSharedCorrector(new SpellCorrector(wf, { distance: 1 }));
});

afterEach(() => {
  setSharedCorrector(null);
  vi.restoreAllMocks();
});

describe("POST /api/spell/v1/check", () => {
  it("returns misspellings", async () => {
    const res = await POST(jsonRequest({ text: "teh cat sta" }));
    expect(res.status).toBe(200);
    expect(res.headers.get("Cache-Control")).toBe("no-store");
    expect(await res.json()).toEqual({
      matches: [
        { word: "teh", offset: 0, length: 3, correction: "the", candidates: ["the"] },
        { word: "sta", offset: 8, length: 3, correction: "sat", candidates: ["sat"] },
      ],
    });
  });

  it("rejects a non-JSON body", async () => {
    const res = await POST(jsonRequest("text=teh", "application/x-www-form-urlencoded"));
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: "Expected application/json body" });
  });

  it("rejects empty text", async () => {
    const res = await POST(jsonRequest({ text: "   " }));
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: "Field 'text' is required and must be a non-empty string" });
  });

  it("rejects a bad suggestion limit", async () => {
    const res = await POST(jsonRequest({ text: "teh", maxSuggestions: 0 }));
    expect(res.status).toBe(400);
  });

  it("reports load failures as 500", async () => {
    setSharedCorrector(null);
    vi.stubEnv("SPELL_LANGUAGE", "zz");
    vi.spyOn(console, "warn").mockImplementation(() => {});
    const res = await POST(jsonRequest({ text: "teh" }));
    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({ error: "The provided dictionary language (zz) does not exist!" });
    vi.unstubAllEnvs();
  });
});
