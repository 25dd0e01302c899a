import { z } from "zod";

// ---- Session config ----

export interface CanvasConfig {
  width: number;
  height: number;
  background: string;
}

export interface SessionConfig {
  canvas: CanvasConfig;
  stroke_width: number;
}

export const DEFAULT_SESSION_CONFIG: SessionConfig = {
  canvas: { width: 800, height: 600, background: "white" },
  stroke_width: 2,
};

// ---- Zod schemas for runtime validation ----

const CanvasSchema = z.object({
  width: z
    .number()
    .int()
    .positive()
    .default(DEFAULT_SESSION_CONFIG.canvas.width),
  height: z
    .number()
    .int()
    .positive()
    .default(DEFAULT_SESSION_CONFIG.canvas.height),
  background: z
    .string()
    .min(1)
    .default(DEFAULT_SESSION_CONFIG.canvas.background),
});

export const SessionConfigSchema = z.object({
  canvas: CanvasSchema.default({}),
  stroke_width: z
    .number()
    .positive()
    .default(DEFAULT_SESSION_CONFIG.stroke_width),
});
