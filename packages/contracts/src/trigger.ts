/**
 * Webhook Trigger
 *
 * Response of `POST /api/v1/trigger/{webhook}`:
 *   { "webhook": "research", "triggered": true }
 */

import { z } from "zod";
import { defineCodec, type WireCodec } from "./codec.js";

export interface TriggerResult {
  /** Webhook path the orchestrator matched */
  readonly webhook: string;
  readonly triggered: boolean;
}

export const TriggerResultWireSchema = z.object({
  webhook: z.string(),
  triggered: z.boolean(),
});

export type TriggerResultWire = z.output<typeof TriggerResultWireSchema>;

export const triggerResultCodec: WireCodec<TriggerResult, TriggerResultWire> = defineCodec({
  entity: "TriggerResult",
  schema: TriggerResultWireSchema,
  toDomain: (wire): TriggerResult => ({ webhook: wire.webhook, triggered: wire.triggered }),
  toWire: (result): TriggerResultWire => ({
    webhook: result.webhook,
    triggered: result.triggered,
  }),
});
