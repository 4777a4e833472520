import yaml from "js-yaml";
import type { ElementKind, FallbackPolicy, KindTable, PlacementConfig, PlacementConfigPatch } from "../types.js";
import { ELEMENT_KINDS, cloneDefaultConfig } from "./defaults.js";
import { asNumber, isRecord } from "./guards.js";

const FALLBACK_POLICIES: readonly FallbackPolicy[] = ["force-least-overlap", "suppress"];

function isElementKind(input: string): input is ElementKind {
  return ELEMENT_KINDS.some((kind) => kind === input);
}

function isFallbackPolicy(input: unknown): input is FallbackPolicy {
  return FALLBACK_POLICIES.some((policy) => policy === input);
}

function nonNegative(input: unknown, path: string): number {
  const value = asNumber(input);
  if (value === undefined || value < 0) {
    throw new Error(`${path} must be a non-negative number`);
  }
  return value;
}

function parseKindTable<T>(input: unknown, path: string, read: (value: unknown, path: string) => T): Partial<KindTable<T>> {
  if (!isRecord(input)) {
    throw new Error(`${path} must be a mapping of element kind to value`);
  }
  const out: Partial<KindTable<T>> = {};
  for (const [key, value] of Object.entries(input)) {
    if (!isElementKind(key)) {
      throw new Error(`${path}.${key} is not an element kind (expected one of ${ELEMENT_KINDS.join(", ")})`);
    }
    out[key] = read(value, `${path}.${key}`);
  }
  return out;
}

function readFallback(input: unknown, path: string): FallbackPolicy {
  if (!isFallbackPolicy(input)) {
    throw new Error(`${path} must be one of ${FALLBACK_POLICIES.join(" | ")}`);
  }
  return input;
}

function readTiers(input: unknown, path: string): number[] {
  if (!Array.isArray(input) || input.length === 0) {
    throw new Error(`${path} must be a non-empty list of radius multipliers`);
  }
  return input.map((value, index) => {
    const tier = asNumber(value);
    if (tier === undefined || tier <= 0) {
      throw new Error(`${path}[${index}] must be a positive number`);
    }
    return tier;
  });
}

export function parsePlacementConfig(input: unknown): PlacementConfigPatch {
  if (input === undefined || input === null) {
    return {};
  }
  if (!isRecord(input)) {
    throw new Error("placement config must be a mapping");
  }

  const patch: PlacementConfigPatch = {};
  if (input.clearance !== undefined) {
    patch.clearance = parseKindTable(input.clearance, "clearance", nonNegative);
  }
  if (input.padding !== undefined) {
    patch.padding = nonNegative(input.padding, "padding");
  }
  if (input.fallback !== undefined) {
    patch.fallback = parseKindTable(input.fallback, "fallback", readFallback);
  }
  if (input.excludeLabelDirections !== undefined) {
    if (typeof input.excludeLabelDirections !== "boolean") {
      throw new Error("excludeLabelDirections must be true or false");
    }
    patch.excludeLabelDirections = input.excludeLabelDirections;
  }
  if (input.clearanceTiers !== undefined) {
    patch.clearanceTiers = readTiers(input.clearanceTiers, "clearanceTiers");
  }
  return patch;
}

export function parsePlacementConfigYaml(raw: string): PlacementConfigPatch {
  return parsePlacementConfig(yaml.load(raw));
}

export function resolvePlacementConfig(patch?: PlacementConfigPatch): PlacementConfig {
  const config = cloneDefaultConfig();
  if (!patch) {
    return config;
  }

  if (patch.clearance) {
    config.clearance = { ...config.clearance, ...patch.clearance };
  }
  if (patch.padding !== undefined) {
    config.padding = patch.padding;
  }
  if (patch.fallback) {
    config.fallback = { ...config.fallback, ...patch.fallback };
  }
  if (patch.excludeLabelDirections !== undefined) {
    config.excludeLabelDirections = patch.excludeLabelDirections;
  }
  if (patch.clearanceTiers) {
    config.clearanceTiers = [...patch.clearanceTiers];
  }
  return config;
}
