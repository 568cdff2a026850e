/**
 * Gemini via Vertex AI REST, JSON response mode.
 * The response schema comes from the field registry; the model's rows are still untrusted.
 */

import { GoogleAuth } from "google-auth-library";
import type { VertexConfig } from "../../../libs/config.js";
import type { ResponseSchemaNode } from "../registry/index.js";

export type AccessTokenSource = () => Promise<string>;

export type GenerateJsonOptions = {
  responseSchema: ResponseSchemaNode;
  temperature?: number;
  maxOutputTokens?: number;
};

let auth: GoogleAuth | null = null;

/** Application Default Credentials. */
export const googleAccessToken: AccessTokenSource = async () => {
  if (!auth) {
    auth = new GoogleAuth({ scopes: ["https://www.googleapis.com/auth/cloud-platform"] });
  }
  const client = await auth.getClient();
  const token = await client.getAccessToken();
  if (!token.token) {
    throw new Error("Failed to get Vertex AI access token");
  }
  return token.token;
};

export function generateContentUrl(config: VertexConfig, projectId: string): string {
  const { location, model } = config;
  return `https://${location}-aiplatform.googleapis.com/v1/projects/${projectId}/locations/${location}/publishers/google/models/${model}:generateContent`;
}

/** Returns the raw text of the first candidate; the caller parses it. */
export async function generateJson(
  config: VertexConfig,
  systemPrompt: string,
  userPrompt: string,
  options: GenerateJsonOptions,
  getAccessToken: AccessTokenSource = googleAccessToken,
): Promise<string> {
  if (!config.projectId) {
    throw new Error("GCP_PROJECT or GOOGLE_CLOUD_PROJECT required for Vertex AI");
  }
  const token = await getAccessToken();

  const body = {
    contents: [{ role: "user", parts: [{ text: userPrompt }] }],
    system_instruction: { parts: [{ text: systemPrompt }] },
    generationConfig: {
      temperature: options.temperature ?? config.temperature,
      topP: 0.9,
      maxOutputTokens: options.maxOutputTokens ?? config.maxOutputTokens,
      responseMimeType: "application/json",
      responseSchema: options.responseSchema,
    },
  };

  const res = await fetch(generateContentUrl(config, config.projectId), {
    method: "POST",
    headers: {
      "Content-Type": "application/json",
      Authorization: `Bearer ${token}`,
    },
    body: JSON.stringify(body),
  });

  if (!res.ok) {
    const errText = await res.text();
    throw new Error(`Vertex AI error ${res.status}: ${errText}`);
  }

  const data = (await res.json()) as {
    candidates?: Array<{ content?: { parts?: Array<{ text?: string }> } }>;
  };
  const text = data.candidates?.[0]?.content?.parts?.[0]?.text;
  if (text == null) {
    throw new Error("Vertex AI returned no text");
  }
  return text;
}
