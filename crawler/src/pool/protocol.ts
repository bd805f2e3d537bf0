import { z } from "zod";

const crawlJobSchema = z.object({
  startUrls: z.array(z.string()),
  allowedDomains: z.array(z.string()),
});

const pageResultSchema = z.object({
  url: z.string(),
  text: z.string(),
});

export const parentMessageSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("run"), jobId: z.string(), job: crawlJobSchema }),
  z.object({ type: z.literal("stop") }),
]);

export const childMessageSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("ready") }),
  z.object({
    type: z.literal("done"),
    jobId: z.string(),
    results: z.array(pageResultSchema),
  }),
  z.object({ type: z.literal("failed"), jobId: z.string(), error: z.string() }),
]);

/** Sent by the manager process to a worker. */
export type ParentMessage = z.infer<typeof parentMessageSchema>;

/** Sent by a worker back to the manager process. */
export type ChildMessage = z.infer<typeof childMessageSchema>;
