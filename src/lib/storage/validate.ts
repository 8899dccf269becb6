/**
 * Readers for untyped snapshot data. Each reader either returns a value of
 * the expected shape or throws PlannerError("invalid-argument") naming the
 * offending path.
 */

import { PlannerError } from "@/lib/errors"

export type Reader<T> = (value: unknown, path: string) => T

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value)
}

export function invalid(path: string, expected: string): never {
  throw new PlannerError("invalid-argument", "loadSnapshot", `invalid snapshot: ${path} must be ${expected}`, {
    path,
  })
}

export const readRecord: Reader<Record<string, unknown>> = (value, path) =>
  isRecord(value) ? value : invalid(path, "an object")

export const readNumber: Reader<number> = (value, path) =>
  typeof value === "number" && Number.isFinite(value) ? value : invalid(path, "a finite number")

export const readInteger: Reader<number> = (value, path) =>
  Number.isInteger(value) && typeof value === "number" ? value : invalid(path, "an integer")

export const readString: Reader<string> = (value, path) =>
  typeof value === "string" ? value : invalid(path, "a string")

export function nullable<T>(read: Reader<T>): Reader<T | null> {
  return (value, path) => (value === null || value === undefined ? null : read(value, path))
}

export function arrayOf<T>(read: Reader<T>): Reader<T[]> {
  return (value, path) => {
    if (!Array.isArray(value)) return invalid(path, "an array")
    return value.map((item, index) => read(item, `${path}[${index}]`))
  }
}

export function recordOf<T>(read: Reader<T>): Reader<Record<string, T>> {
  return (value, path) => {
    const record = readRecord(value, path)
    const result: Record<string, T> = {}
    for (const [key, item] of Object.entries(record)) {
      result[key] = read(item, `${path}.${key}`)
    }
    return result
  }
}

/** Read a required field of an object */
export function field<T>(record: Record<string, unknown>, key: string, path: string, read: Reader<T>): T {
  return read(record[key], `${path}.${key}`)
}
