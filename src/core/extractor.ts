import { InvalidInputError } from "./errors";
import {
  ExtractedIntelligence,
  INTEL_CATEGORIES,
  IntelCategory,
  IntelligenceSets,
  emptyIntelligence
} from "../utils/types";

export const UPI_HANDLES: readonly string[] = [
  "upi",
  "paytm",
  "ybl",
  "ibl",
  "axl",
  "apl",
  "phonepe",
  "gpay",
  "okhdfcbank",
  "oksbi",
  "okicici",
  "okaxis",
  "okpaytm",
  "sbi",
  "hdfc",
  "hdfcbank",
  "icici",
  "upiicici",
  "axis",
  "axisbank",
  "kotak",
  "baroda",
  "indus",
  "federal",
  "pnb",
  "boi"
];

const handleSet = new Set(UPI_HANDLES);

const urlRegex = /https?:\/\/[^\s<>"'{}|\\^`[\]]+/gi;
const bareUrlRegex =
  /(?<![\w@./-])(?:www\.)?[a-z0-9](?:[a-z0-9-]*[a-z0-9])?(?:\.[a-z0-9](?:[a-z0-9-]*[a-z0-9])?)*\.[a-z]{2,}(?:\/|\?(?=\S))[^\s<>"'{}|\\^`[\]]*/gi;
// Bare domains need a TLD scammers actually use, so "Mr.Sharma/Bank" stays text.
const BARE_DOMAIN_TLDS = new Set([
  "com", "net", "org", "in", "co", "io", "info", "biz", "xyz", "top", "online", "site", "club", "live", "app", "link",
  "me", "ly", "gov", "edu", "shop", "store", "tk", "ml", "ga", "cf", "gq", "cc", "ws", "page", "click", "icu"
]);
const upiRegex = /(?<![\w.@-])([a-z0-9._-]+)@([a-z]+)(?![\w-]|\.[a-z0-9])/gi;
const ifscRegex = /\b[a-z]{4}0[a-z0-9]{6}\b/gi;
const digitRunRegex = /(?<![\w+]|\d[.,])(\+91[\s-]?|91[\s-])?(\d+)(?!\w|[.,]\d)/g;
const trailingPunctuation = /[.,;:!?)\]}'"]+$/;

const IFSC_FORMAT = /^[A-Z]{4}0[A-Z0-9]{6}$/;
const MOBILE_CORE = /^[6-9]\d{9}$/;

type Span = { start: number; end: number };

type Collector = {
  values: ExtractedIntelligence;
  claimed: Span[];
};

export function isValidIfsc(code: string): boolean {
  return IFSC_FORMAT.test(code.toUpperCase());
}

function overlaps(claimed: Span[], span: Span): boolean {
  return claimed.some((c) => span.start < c.end && c.start < span.end);
}

function emit(collector: Collector, category: IntelCategory, value: string, span: Span): void {
  collector.claimed.push(span);
  const list = collector.values[category];
  if (!list.includes(value)) list.push(value);
}

function hasKnownTld(bareUrl: string): boolean {
  const host = bareUrl.split(/[/?]/)[0].toLowerCase();
  return BARE_DOMAIN_TLDS.has(host.slice(host.lastIndexOf(".") + 1));
}

function collectUrls(text: string, collector: Collector): void {
  for (const regex of [urlRegex, bareUrlRegex]) {
    for (const match of text.matchAll(regex)) {
      const start = match.index ?? 0;
      const span = { start, end: start + match[0].length };
      if (overlaps(collector.claimed, span)) continue;
      const url = match[0].replace(trailingPunctuation, "");
      if (!url.includes(".")) continue;
      if (regex === bareUrlRegex && !hasKnownTld(url)) continue;
      emit(collector, "phishingUrls", url, span);
    }
  }
}

function collectUpiIds(text: string, collector: Collector): void {
  for (const match of text.matchAll(upiRegex)) {
    const handle = match[2].toLowerCase();
    if (!handleSet.has(handle)) continue;
    const start = match.index ?? 0;
    const span = { start, end: start + match[0].length };
    if (overlaps(collector.claimed, span)) continue;
    emit(collector, "upiIds", `${match[1].toLowerCase()}@${handle}`, span);
  }
}

function collectIfscCodes(text: string, collector: Collector): void {
  for (const match of text.matchAll(ifscRegex)) {
    const code = match[0].toUpperCase();
    if (!isValidIfsc(code)) continue;
    const start = match.index ?? 0;
    const span = { start, end: start + match[0].length };
    if (overlaps(collector.claimed, span)) continue;
    emit(collector, "ifscCodes", code, span);
  }
}

/**
 * Phone shape is tested before bank shape. A run that carries an explicit
 * +91 / "91 " prefix is judged on the digits after the prefix.
 */
export function classifyDigitRun(
  prefix: string | undefined,
  digits: string
): { category: "phoneNumbers" | "bankAccounts"; value: string } | null {
  if (MOBILE_CORE.test(digits)) return { category: "phoneNumbers", value: digits };
  if (!prefix) {
    if (digits.length === 12 && digits.startsWith("91") && MOBILE_CORE.test(digits.slice(2))) {
      return { category: "phoneNumbers", value: digits.slice(2) };
    }
    if (digits.length === 11 && digits.startsWith("0") && MOBILE_CORE.test(digits.slice(1))) {
      return { category: "phoneNumbers", value: digits.slice(1) };
    }
  }
  if (digits.length >= 9 && digits.length <= 18) {
    return { category: "bankAccounts", value: digits };
  }
  return null;
}

function collectDigitRuns(text: string, collector: Collector): void {
  for (const match of text.matchAll(digitRunRegex)) {
    const start = match.index ?? 0;
    const span = { start, end: start + match[0].length };
    if (overlaps(collector.claimed, span)) continue;
    const classified = classifyDigitRun(match[1], match[2]);
    if (!classified) continue;
    emit(collector, classified.category, classified.value, span);
  }
}

/**
 * Scans a single text for identifiers. Pure: the caller merges the result
 * into whatever running set it keeps.
 */
export function extractIntelligence(text: unknown): ExtractedIntelligence {
  if (typeof text !== "string") {
    throw new InvalidInputError("extractor input must be a string");
  }
  const collector: Collector = { values: emptyIntelligence(), claimed: [] };
  collectUrls(text, collector);
  collectUpiIds(text, collector);
  collectIfscCodes(text, collector);
  collectDigitRuns(text, collector);
  return collector.values;
}

export function mergeIntelligence(target: IntelligenceSets, delta: ExtractedIntelligence): number {
  let added = 0;
  for (const category of INTEL_CATEGORIES) {
    for (const raw of delta[category]) {
      const value = raw.trim();
      if (!value || target[category].has(value)) continue;
      target[category].add(value);
      added += 1;
    }
  }
  return added;
}

export function snapshotIntelligence(sets: IntelligenceSets): ExtractedIntelligence {
  return {
    bankAccounts: Array.from(sets.bankAccounts),
    upiIds: Array.from(sets.upiIds),
    phishingUrls: Array.from(sets.phishingUrls),
    ifscCodes: Array.from(sets.ifscCodes),
    phoneNumbers: Array.from(sets.phoneNumbers)
  };
}

export function countIntelligence(intel: ExtractedIntelligence): number {
  return INTEL_CATEGORIES.reduce((sum, category) => sum + intel[category].length, 0);
}

export function normalizeText(text: string): string {
  return text.toLowerCase().replace(/\s+/g, " ").trim();
}
