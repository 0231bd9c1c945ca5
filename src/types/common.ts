import { randomUUID } from "node:crypto";

export type UUID = string;
export type Timestamp = number; // epoch ms

export function generateId(): UUID {
  return randomUUID();
}

export function now(): Timestamp {
  return Date.now();
}

export function isoNow(): string {
  return new Date().toISOString();
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
