/**
 * Helpers for reading DynamoDB items
 */

import type { DynamoDBDocumentClient } from "@aws-sdk/lib-dynamodb"
import { isJsonObject } from "../../shared/types"

/** The part of the document client the repositories use */
export type DocumentClient = Pick<DynamoDBDocumentClient, "send">

export type Item = Record<string, unknown>

export function readString(item: Item, key: string): string {
  const value = item[key]
  if (typeof value === "string") {
    return value
  }
  if (typeof value === "number") {
    return String(value)
  }
  return ""
}

export function readOptionalString(item: Item, key: string): string | null {
  const value = item[key]
  if (typeof value === "string") {
    return value
  }
  if (typeof value === "number") {
    return String(value)
  }
  return null
}

export function readNumber(item: Item, key: string, fallback: number = 0): number {
  const value = item[key]
  return typeof value === "number" && Number.isFinite(value) ? value : fallback
}

export function readBoolean(item: Item, key: string, fallback: boolean): boolean {
  const value = item[key]
  return typeof value === "boolean" ? value : fallback
}

export function readDate(item: Item, key: string): Date {
  const value = item[key]
  return typeof value === "string" ? new Date(value) : new Date(0)
}

export function readOptionalDate(item: Item, key: string): Date | null {
  const value = item[key]
  return typeof value === "string" ? new Date(value) : null
}

export function readStringList(item: Item, key: string): string[] {
  const value = item[key]
  if (!Array.isArray(value)) {
    return []
  }
  return value.filter((entry): entry is string => typeof entry === "string")
}

export function readMapList(item: Item, key: string): Item[] {
  const value = item[key]
  if (!Array.isArray(value)) {
    return []
  }
  return value.filter(isJsonObject)
}

export function readMap(item: Item, key: string): Item {
  const value = item[key]
  return isJsonObject(value) ? value : {}
}
