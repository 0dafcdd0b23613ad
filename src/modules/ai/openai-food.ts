// src/modules/ai/openai-food.ts
import { z } from "zod";
import { FoodSyncError, errorMessage, type FoodSyncErrorCode } from "../../utils/errors";
import { createLogger } from "../../utils/logger";
import type { NormalizedImage } from "../images/normalize";
import type { FoodAnalyzer, FoodDetection } from "../sync/types";

const log = createLogger("openai");

const RESPONSES_URL = "https://api.openai.com/v1/responses";

export type OpenAiFoodOptions = {
  apiKey: string;
  visionModel: string;
  textModel: string;
};

/**
 * Vision contract. `foodName` is null when nothing edible is in frame.
 */
export const FoodDetectionSchema = z.object({
  hasFood: z.boolean(),
  foodName: z.string().trim().max(200).nullable(),
});

const ResponsesEnvelopeSchema = z.object({
  output_text: z.string().optional(),
  output: z
    .array(
      z.object({
        content: z
          .array(z.object({ type: z.string(), text: z.string().optional() }))
          .nullish(),
      })
    )
    .optional(),
});

const CLASSIFY_PROMPT = `
Analyze this image and identify any food items.

Return STRICT JSON only with EXACT keys:
{
  "hasFood": boolean,
  "foodName": string|null
}

Rules:
- Output JSON ONLY (no markdown, no extra text)
- If no food is visible, return {"hasFood": false, "foodName": null}
- If food is visible, foodName is the main food item(s) in a concise format
`.trim();

const RECIPE_SYSTEM = "You are a helpful cooking assistant. Provide concise, practical recipes.";

export function buildRecipePrompt(foodName: string) {
  return `Create a simple recipe for ${foodName}. Include ingredients and brief steps. Keep it under 200 words.`;
}

/** First `output_text` block of a Responses API payload. */
export function extractOutputText(payload: unknown): string {
  const parsed = ResponsesEnvelopeSchema.safeParse(payload);
  if (!parsed.success) return "";

  for (const item of parsed.data.output ?? []) {
    const text = item.content?.find((c) => c.type === "output_text")?.text;
    if (text) return text;
  }
  return parsed.data.output_text ?? "";
}

/** Maps the model's JSON (or a bare `NO_FOOD` answer) to a detection. */
export function toDetection(outText: string): FoodDetection {
  const trimmed = outText.trim();
  if (!trimmed || trimmed.toUpperCase() === "NO_FOOD") return { kind: "no_food" };

  let json: unknown;
  try {
    json = JSON.parse(trimmed);
  } catch {
    throw new Error("OPENAI_RETURNED_NON_JSON");
  }

  const detection = FoodDetectionSchema.parse(json);
  const name = detection.foodName ?? "";
  if (!detection.hasFood || !name || name.toUpperCase() === "NO_FOOD") return { kind: "no_food" };
  return { kind: "food", name };
}

async function callResponses(
  apiKey: string,
  body: Record<string, unknown>,
  tag: string,
  code: FoodSyncErrorCode
): Promise<string> {
  let resp: Response;
  try {
    resp = await fetch(RESPONSES_URL, {
      method: "POST",
      headers: {
        Authorization: `Bearer ${apiKey}`,
        "Content-Type": "application/json",
      },
      body: JSON.stringify(body),
    });
  } catch (e) {
    throw new FoodSyncError(code, `${tag}:NETWORK:${errorMessage(e)}`, { cause: e });
  }

  if (!resp.ok) {
    const txt = await resp.text().catch(() => "");
    throw new FoodSyncError(code, `${tag}:${resp.status}:${txt.slice(0, 250)}`);
  }

  const outText = extractOutputText(await resp.json());
  if (!outText.trim()) {
    throw new FoodSyncError(code, `${tag}:OPENAI_RETURNED_EMPTY_OUTPUT`);
  }
  return outText;
}

export function createOpenAiFoodAnalyzer(opts: OpenAiFoodOptions): FoodAnalyzer {
  return {
    async classifyFood(image: NormalizedImage): Promise<FoodDetection> {
      const outText = await callResponses(
        opts.apiKey,
        {
          model: opts.visionModel,
          temperature: 0, // deterministic
          max_output_tokens: 150,
          text: { format: { type: "json_object" } },
          input: [
            {
              role: "user",
              content: [
                { type: "input_text", text: CLASSIFY_PROMPT },
                { type: "input_image", image_url: `data:${image.mime};base64,${image.bytes.toString("base64")}` },
              ],
            },
          ],
        },
        "OPENAI_FAIL_CLASSIFY",
        "CLASSIFICATION_FAILED"
      );

      let detection: FoodDetection;
      try {
        detection = toDetection(outText);
      } catch (e) {
        throw new FoodSyncError("CLASSIFICATION_FAILED", `OPENAI_FAIL_CLASSIFY:${errorMessage(e)}`, { cause: e });
      }

      if (detection.kind === "food") log.info(`Food detected: ${detection.name}`);
      else log.info("No food detected in image");
      return detection;
    },

    async generateRecipe(foodName: string): Promise<string> {
      const recipe = await callResponses(
        opts.apiKey,
        {
          model: opts.textModel,
          max_output_tokens: 300,
          input: [
            { role: "system", content: [{ type: "input_text", text: RECIPE_SYSTEM }] },
            { role: "user", content: [{ type: "input_text", text: buildRecipePrompt(foodName) }] },
          ],
        },
        "OPENAI_FAIL_RECIPE",
        "RECIPE_GENERATION_FAILED"
      );

      log.info(`Generated recipe for ${foodName}`);
      return recipe.trim();
    },
  };
}
