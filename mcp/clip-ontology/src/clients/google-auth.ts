import fs from "fs";
import jwt from "jsonwebtoken";
import { z } from "zod";
import { ConfigError } from "../errors.js";

const ServiceAccountSchema = z.object({
  client_email: z.string(),
  private_key: z.string(),
  project_id: z.string(),
});

const TokenResponseSchema = z.object({
  access_token: z.string(),
  expires_in: z.number(),
});

export interface AccessTokenResult {
  accessToken: string;
  projectId: string;
}

const tokenCache = new Map<string, { token: string; projectId: string; expiresAt: number }>();

/**
 * Get a Google Cloud access token for Vertex AI from a service account key
 * file (JWT bearer exchange). Tokens are cached per key file.
 */
export async function getGoogleAccessToken(serviceAccountPath: string | null): Promise<AccessTokenResult> {
  if (!serviceAccountPath) {
    throw new ConfigError("serviceAccountPath not configured in data/config.json");
  }

  const now = Math.floor(Date.now() / 1000);

  // Return cached token if still valid (with 5 minute buffer)
  const cached = tokenCache.get(serviceAccountPath);
  if (cached && cached.expiresAt > now + 300) {
    return { accessToken: cached.token, projectId: cached.projectId };
  }

  if (!fs.existsSync(serviceAccountPath)) {
    throw new ConfigError(`Service account file not found: ${serviceAccountPath}`);
  }

  const parsed = ServiceAccountSchema.safeParse(JSON.parse(fs.readFileSync(serviceAccountPath, "utf-8")));
  if (!parsed.success) {
    throw new ConfigError(`Service account file is missing client_email, private_key or project_id: ${serviceAccountPath}`);
  }
  const serviceAccount = parsed.data;

  const jwtPayload = {
    iss: serviceAccount.client_email,
    sub: serviceAccount.client_email,
    aud: "https://oauth2.googleapis.com/token",
    iat: now,
    exp: now + 3600,
    scope: "https://www.googleapis.com/auth/cloud-platform",
  };

  const signedJwt = jwt.sign(jwtPayload, serviceAccount.private_key, {
    algorithm: "RS256",
  });

  const response = await fetch("https://oauth2.googleapis.com/token", {
    method: "POST",
    headers: { "Content-Type": "application/x-www-form-urlencoded" },
    body: `grant_type=urn:ietf:params:oauth:grant-type:jwt-bearer&assertion=${signedJwt}`,
  });

  if (!response.ok) {
    const errorText = await response.text();
    throw new Error(`Failed to get access token: ${response.status} ${errorText}`);
  }

  const data = TokenResponseSchema.parse(await response.json());

  tokenCache.set(serviceAccountPath, {
    token: data.access_token,
    projectId: serviceAccount.project_id,
    expiresAt: now + data.expires_in,
  });

  return { accessToken: data.access_token, projectId: serviceAccount.project_id };
}

/**
 * Build Vertex AI endpoint URL
 *
 * @param location - Region, or "global" for models served only from the global endpoint
 */
export function buildVertexUrl(
  projectId: string,
  model: string,
  method: string,
  location: string = "us-central1"
): string {
  if (location === "global") {
    return `https://aiplatform.googleapis.com/v1/projects/${projectId}/locations/global/publishers/google/models/${model}:${method}`;
  }
  return `https://${location}-aiplatform.googleapis.com/v1/projects/${projectId}/locations/${location}/publishers/google/models/${model}:${method}`;
}
