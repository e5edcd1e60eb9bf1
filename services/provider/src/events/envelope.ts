import { randomUUID } from "node:crypto";
import type { VmEvent } from "../types/vm.js";

export const RESOURCE_KIND = "vm";
export const DEFAULT_EVENT_SOURCE = "vm-provider";
export const DEFAULT_EVENT_TYPE = "io.vm-provider.vm.status";

/** CloudEvents 1.0 structured-mode JSON. */
export interface CloudEventEnvelope<T> {
  specversion: "1.0";
  id: string;
  type: string;
  source: string;
  subject: string;
  time: string;
  datacontenttype: "application/json";
  data: T;
}

export interface EnvelopeAttributes {
  source: string;
  type: string;
}

export const subjectFor = (vmId: string) => `${RESOURCE_KIND}.${vmId}`;

export function buildEnvelope(event: VmEvent, attrs: EnvelopeAttributes, id: string = randomUUID()): CloudEventEnvelope<VmEvent> {
  return {
    specversion: "1.0",
    id,
    type: attrs.type,
    source: attrs.source,
    subject: subjectFor(event.vmId),
    time: event.timestamp,
    datacontenttype: "application/json",
    data: event
  };
}
