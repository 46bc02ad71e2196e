/**
 * One run's data as a single key → value mapping.
 *
 * Metadata keys (`config.*`, `info.*`) are held in memory. Keys flagged with
 * the LAZY_DATA sentinel resolve through a LazyField named after the key's
 * first segment, so `metrics.loss` reads column `loss` of
 * `<runDir>/metrics/metrics.jsonl`.
 */
import { LAZY_DATA, metricsPath, type FlatRecord, type JsonValue } from "@labtrack/core";
import { LazyField } from "./lazy-field.js";

export type FieldSlot =
  | { readonly kind: "eager"; readonly value: JsonValue }
  | { readonly kind: "lazy"; readonly field: string; readonly column: string };

function lazySlot(key: string): FieldSlot {
  const dot = key.indexOf(".");
  if (dot < 0) return { kind: "lazy", field: key, column: key };
  return { kind: "lazy", field: key.slice(0, dot), column: key.slice(dot + 1) };
}

export class RunRecord {
  readonly runDir: string;
  private readonly slots = new Map<string, FieldSlot>();
  private readonly fields = new Map<string, LazyField>();

  constructor(flat: FlatRecord, runDir: string) {
    this.runDir = runDir;
    for (const [key, value] of Object.entries(flat)) {
      if (value === LAZY_DATA) {
        const slot = lazySlot(key);
        this.slots.set(key, slot);
        if (slot.kind === "lazy" && !this.fields.has(slot.field)) {
          this.fields.set(slot.field, new LazyField(slot.field, metricsPath(runDir, slot.field)));
        }
      } else {
        this.slots.set(key, { kind: "eager", value });
      }
    }
  }

  /** Run id from `info.run_id`, when the metadata carries one. */
  get id(): number | undefined {
    const slot = this.slots.get("info.run_id");
    return slot?.kind === "eager" && typeof slot.value === "number" ? slot.value : undefined;
  }

  get size(): number {
    return this.slots.size;
  }

  has(key: string): boolean {
    return this.slots.has(key);
  }

  keys(): string[] {
    return [...this.slots.keys()];
  }

  slot(key: string): FieldSlot | undefined {
    return this.slots.get(key);
  }

  /** Values are copies: mutating one leaves the record unchanged. */
  get(key: string): JsonValue | undefined {
    const slot = this.slots.get(key);
    if (!slot) return undefined;
    if (slot.kind === "eager") return structuredClone(slot.value);
    return this.fields.get(slot.field)?.get(slot.column);
  }

  lazyField(name: string): LazyField | undefined {
    return this.fields.get(name);
  }

  /** Keys and eager values, with lazy keys shown as the LAZY_DATA sentinel. */
  flattened(): FlatRecord {
    const out: FlatRecord = {};
    for (const [key, slot] of this.slots) {
      out[key] = slot.kind === "eager" ? slot.value : LAZY_DATA;
    }
    return out;
  }

  /** Store values in memory, replacing any existing slot of the same key. */
  update(values: FlatRecord): this {
    for (const [key, value] of Object.entries(values)) {
      this.slots.set(key, { kind: "eager", value });
    }
    return this;
  }

  freeUnused(): void {
    for (const field of this.fields.values()) field.freeUnused();
  }

  clone(): RunRecord {
    const copy = new RunRecord({}, this.runDir);
    for (const [key, slot] of this.slots) {
      copy.slots.set(key, slot.kind === "eager" ? { kind: "eager", value: structuredClone(slot.value) } : slot);
    }
    for (const [name, field] of this.fields) copy.fields.set(name, field.clone());
    return copy;
  }
}
