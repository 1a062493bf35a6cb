import { z } from "zod";

const port = z.number().int().min(0).max(65535);
const positiveMs = z.number().int().positive();
const nonEmpty = z.string().min(1);

export const bridgeConfigSchema = z
  .object({
    // Network
    host: nonEmpty.optional(),
    port: port.optional(),

    // Supervised program
    resourceRoot: nonEmpty.optional(),
    command: nonEmpty.optional(),
    args: z.array(z.string()).optional(),

    // Transport
    preferPty: z.boolean().optional(),
    ptyCols: z.number().int().min(1).optional(),
    ptyRows: z.number().int().min(1).optional(),

    // Termination windows
    gracefulStopTimeoutMs: positiveMs.optional(),
    killTimeoutMs: positiveMs.optional(),
    forceKillTimeoutMs: positiveMs.optional(),
    exitDrainTimeoutMs: z.number().int().min(0).optional(),

    // Framing
    maxLineBufferBytes: z.number().int().min(0).optional(),

    // Fan-out
    maxSubscriberBacklog: z.number().int().positive().optional(),

    // Static viewer
    viewerFile: nonEmpty.optional(),
    assetsDir: nonEmpty.optional(),
    rootFiles: z.array(nonEmpty.regex(/^[^/\\]+$/, "must be a bare file name")).optional(),
  })
  .strict();
