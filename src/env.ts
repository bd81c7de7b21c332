import "dotenv/config";
import { z } from "zod";
import { LOCALES } from "./lib/drawingComments";

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(4000),
  MAX_UPLOAD_MB: z.coerce.number().positive().default(50),
  DEFAULT_LOCALE: z.enum(LOCALES).default("en"),
  CORS_ORIGIN: z.string().trim().optional(),
});

console.log("🔧 Loading environment configuration...");

const parsed = EnvSchema.safeParse(process.env);

if (!parsed.success) {
  for (const issue of parsed.error.issues) {
    console.error(`❌ Invalid environment variable ${issue.path.join(".")}: ${issue.message}`);
  }
  throw new Error("Invalid environment configuration");
}

const corsOrigin = (parsed.data.CORS_ORIGIN || "*")
  .split(",")
  .map((s) => s.trim())
  .filter(Boolean);

export const env = {
  PORT: parsed.data.PORT,
  MAX_UPLOAD_BYTES: Math.round(parsed.data.MAX_UPLOAD_MB * 1024 * 1024),
  DEFAULT_LOCALE: parsed.data.DEFAULT_LOCALE,
  // "*" allows any origin
  CORS_ORIGIN: corsOrigin,
} as const;

console.log("✅ Environment configuration loaded successfully");
console.log(`📡 PORT: ${env.PORT}`);
console.log(`🌐 CORS_ORIGIN: ${env.CORS_ORIGIN.join(", ")}`);
console.log(`📄 Max upload: ${parsed.data.MAX_UPLOAD_MB} MB`);
console.log(`🈳 Default export locale: ${env.DEFAULT_LOCALE}`);
