/**
 * OTel metrics for hub operations.
 *
 * Lazily initialized: meters are only created on first access.
 * When no meter provider is registered, these return no-op instruments.
 */

import type { Counter, Histogram } from "@opentelemetry/api";
import { metrics } from "@opentelemetry/api";

const METER_NAME = "meridian";

let _deliveryTotal: Counter | undefined;
let _deliveryLatency: Histogram | undefined;
let _roomProvisioned: Counter | undefined;
let _approvalResolved: Counter | undefined;

/** Deliveries that reached a terminal status, by `status`. */
export function getDeliveryTotal(): Counter {
  if (_deliveryTotal === undefined) {
    _deliveryTotal = metrics.getMeter(METER_NAME).createCounter("meridian.delivery.total", {
      description: "Deliveries by terminal status",
    });
  }
  return _deliveryTotal;
}

export function getDeliveryLatency(): Histogram {
  if (_deliveryLatency === undefined) {
    _deliveryLatency = metrics
      .getMeter(METER_NAME)
      .createHistogram("meridian.delivery.latency_ms", {
        description: "Time from accepting a delivery to its terminal status",
        unit: "ms",
      });
  }
  return _deliveryLatency;
}

export function getRoomProvisioned(): Counter {
  if (_roomProvisioned === undefined) {
    _roomProvisioned = metrics.getMeter(METER_NAME).createCounter("meridian.room.provisioned", {
      description: "Rooms created through the channel collaborator",
    });
  }
  return _roomProvisioned;
}

export function getApprovalResolved(): Counter {
  if (_approvalResolved === undefined) {
    _approvalResolved = metrics.getMeter(METER_NAME).createCounter("meridian.approval.resolved", {
      description: "Approval requests resolved, by decision",
    });
  }
  return _approvalResolved;
}
