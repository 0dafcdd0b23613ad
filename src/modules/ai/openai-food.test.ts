import { afterEach, describe, expect, it, vi } from "vitest";
import { isFoodSyncError } from "../../utils/errors";
import type { NormalizedImage } from "../images/normalize";
import { createOpenAiFoodAnalyzer, extractOutputText, toDetection } from "./openai-food";

const image: NormalizedImage = {
  bytes: Buffer.from("jpeg"),
  mime: "image/jpeg",
  width: 10,
  height: 10,
  colorModel: "rgb",
};

const analyzer = createOpenAiFoodAnalyzer({ apiKey: "test-key", visionModel: "vision-model", textModel: "text-model" });

const envelope = (text: string) => ({
  output: [{ content: [{ type: "output_text", text }] }],
});

function stubFetch(respond: () => Response | Promise<Response>) {
  const fetchMock = vi.fn(async (_url: string | URL | Request, _init?: RequestInit) => respond());
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}

function sentBody(fetchMock: ReturnType<typeof stubFetch>): unknown {
  const body = fetchMock.mock.calls[0][1]?.body;
  return typeof body === "string" ? JSON.parse(body) : undefined;
}

async function rejectionOf(promise: Promise<unknown>) {
  try {
    await promise;
  } catch (e) {
    return e;
  }
  throw new Error("expected a rejection");
}

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("extractOutputText", () => {
  it("reads the first output_text block", () => {
    const payload = {
      output: [
        { content: [{ type: "reasoning" }] },
        { content: [{ type: "output_text", text: "first" }] },
        { content: [{ type: "output_text", text: "second" }] },
      ],
    };
    expect(extractOutputText(payload)).toBe("first");
  });

  it("falls back to the top-level output_text", () => {
    expect(extractOutputText({ output: [], output_text: "flat" })).toBe("flat");
  });

  it("returns an empty string for unknown shapes", () => {
    expect(extractOutputText({ output: "nope" })).toBe("");
  });
});

describe("toDetection", () => {
  it("maps a named food", () => {
    expect(toDetection('{"hasFood": true, "foodName": " Ramen "}')).toEqual({ kind: "food", name: "Ramen" });
  });

  it("maps the negative answers to no_food", () => {
    expect(toDetection("NO_FOOD")).toEqual({ kind: "no_food" });
    expect(toDetection('{"hasFood": false, "foodName": null}')).toEqual({ kind: "no_food" });
    expect(toDetection('{"hasFood": true, "foodName": ""}')).toEqual({ kind: "no_food" });
  });

  it("rejects prose", () => {
    expect(() => toDetection("I see a salad")).toThrow("OPENAI_RETURNED_NON_JSON");
  });
});

describe("createOpenAiFoodAnalyzer", () => {
  it("sends the image as a data URL to the vision model", async () => {
    const fetchMock = stubFetch(
      () => new Response(JSON.stringify(envelope('{"hasFood": true, "foodName": "Tacos"}')), { status: 200 })
    );

    await expect(analyzer.classifyFood(image)).resolves.toEqual({ kind: "food", name: "Tacos" });

    expect(fetchMock.mock.calls[0][0]).toBe("https://api.openai.com/v1/responses");
    expect(sentBody(fetchMock)).toMatchObject({
      model: "vision-model",
      temperature: 0,
      input: [
        {
          role: "user",
          content: [
            { type: "input_text" },
            { type: "input_image", image_url: `data:image/jpeg;base64,${Buffer.from("jpeg").toString("base64")}` },
          ],
        },
      ],
    });
  });

  it("turns an HTTP failure into CLASSIFICATION_FAILED", async () => {
    stubFetch(() => new Response("rate limited", { status: 429 }));

    const err = await rejectionOf(analyzer.classifyFood(image));

    expect(isFoodSyncError(err, "CLASSIFICATION_FAILED")).toBe(true);
    expect(err).toHaveProperty("message", "OPENAI_FAIL_CLASSIFY:429:rate limited");
  });

  it("turns a network failure into CLASSIFICATION_FAILED", async () => {
    stubFetch(() => {
      throw new Error("socket hang up");
    });

    const err = await rejectionOf(analyzer.classifyFood(image));

    expect(err).toHaveProperty("message", "OPENAI_FAIL_CLASSIFY:NETWORK:socket hang up");
  });

  it("treats a malformed answer as a failed classification", async () => {
    stubFetch(() => new Response(JSON.stringify(envelope("a bowl of soup")), { status: 200 }));

    const err = await rejectionOf(analyzer.classifyFood(image));

    expect(isFoodSyncError(err, "CLASSIFICATION_FAILED")).toBe(true);
    expect(err).toHaveProperty("message", "OPENAI_FAIL_CLASSIFY:OPENAI_RETURNED_NON_JSON");
  });

  it("returns the trimmed recipe text from the text model", async () => {
    const fetchMock = stubFetch(() => new Response(JSON.stringify(envelope("\n1. Boil water.\n")), { status: 200 }));

    await expect(analyzer.generateRecipe("Pasta")).resolves.toBe("1. Boil water.");
    expect(sentBody(fetchMock)).toMatchObject({
      model: "text-model",
      input: [
        { role: "system" },
        {
          role: "user",
          content: [
            {
              type: "input_text",
              text: "Create a simple recipe for Pasta. Include ingredients and brief steps. Keep it under 200 words.",
            },
          ],
        },
      ],
    });
  });

  it("rejects an empty recipe with RECIPE_GENERATION_FAILED", async () => {
    stubFetch(() => new Response(JSON.stringify(envelope("   ")), { status: 200 }));

    const err = await rejectionOf(analyzer.generateRecipe("Pasta"));

    expect(isFoodSyncError(err, "RECIPE_GENERATION_FAILED")).toBe(true);
    expect(err).toHaveProperty("message", "OPENAI_FAIL_RECIPE:OPENAI_RETURNED_EMPTY_OUTPUT");
  });
});
