import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import admin from "firebase-admin";
import { AppError } from "./errors.js";

export type Role = "coder" | "reviewer" | "admin";

export type VerifiedToken = {
  uid: string;
  claims: Record<string, unknown>;
};

export type AuthContext = {
  uid: string;
  role: Role;
};

export type TokenVerifier = (idToken: string) => Promise<VerifiedToken>;

function initFirebaseAdminOnce() {
  if (admin.apps.length > 0) return;

  const serviceAccountJson = process.env.FIREBASE_SERVICE_ACCOUNT_KEY;
  if (serviceAccountJson) {
    try {
      const sa = JSON.parse(serviceAccountJson) as admin.ServiceAccount & { project_id?: string };
      admin.initializeApp({
        projectId: sa.project_id ?? process.env.FIREBASE_PROJECT_ID,
        credential: admin.credential.cert(sa),
      });
      return;
    } catch (e) {
      console.warn("FIREBASE_SERVICE_ACCOUNT_KEY parse failed, falling back to ADC:", e);
    }
  }

  admin.initializeApp({
    projectId: process.env.FIREBASE_PROJECT_ID ?? process.env.GCP_PROJECT ?? process.env.GOOGLE_CLOUD_PROJECT,
    credential: admin.credential.applicationDefault(),
  });
}

/** Firebase ID tokens; custom claims carry the role. */
export const firebaseTokenVerifier: TokenVerifier = async (idToken) => {
  initFirebaseAdminOnce();
  const decoded = await admin.auth().verifyIdToken(idToken);
  return { uid: decoded.uid, claims: { ...decoded } };
};

let verifier: TokenVerifier = firebaseTokenVerifier;

export function setTokenVerifier(v: TokenVerifier): void {
  verifier = v;
}

function coerceRole(x: unknown): Role {
  if (x === "coder" || x === "reviewer" || x === "admin") return x;
  return "coder";
}

export async function authenticate(req: FastifyRequest, _reply: FastifyReply) {
  const header = req.headers.authorization;
  const token = header?.startsWith("Bearer ") ? header.slice("Bearer ".length) : undefined;
  if (!token) {
    throw new AppError({ statusCode: 401, code: "UNAUTHORIZED", message: "Missing Authorization: Bearer <token>" });
  }

  let verified: VerifiedToken;
  try {
    verified = await verifier(token);
  } catch (err) {
    req.log.warn({ err }, "ID token verification failed");
    throw new AppError({ statusCode: 401, code: "UNAUTHORIZED", message: "Invalid or expired token" });
  }

  req.auth = { uid: verified.uid, role: coerceRole(verified.claims.role) };
}

export function requireRole(minRole: Role | Role[]) {
  const allowed = new Set(Array.isArray(minRole) ? minRole : [minRole]);
  return async (req: FastifyRequest) => {
    if (!req.auth) throw new AppError({ statusCode: 401, code: "UNAUTHORIZED", message: "Not authenticated" });
    if (!allowed.has(req.auth.role)) {
      throw new AppError({ statusCode: 403, code: "FORBIDDEN", message: "Insufficient role" });
    }
  };
}

/** Actor of an authenticated request; only valid behind `authenticate`. */
export function requireAuth(req: FastifyRequest): AuthContext {
  if (!req.auth) throw new AppError({ statusCode: 401, code: "UNAUTHORIZED", message: "Not authenticated" });
  return req.auth;
}

export async function registerAuth(fastify: FastifyInstance) {
  fastify.decorateRequest("auth", undefined);
}

declare module "fastify" {
  interface FastifyRequest {
    auth?: AuthContext;
  }
}
