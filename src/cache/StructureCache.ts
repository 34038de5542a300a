// src/cache/StructureCache.ts
/**
 * Purpose:
 * - Structure Cache: per record type, the list of field descriptors that
 *   drive resolution. Built once per type on first use, then read-only.
 *
 * Invariants:
 * - fields(T) returns the same frozen array on every call for the life of
 *   the cache.
 * - A field is kept only when its tags name a registered source or transform,
 *   or carry `default`. sourceTags/transformTags follow registration order,
 *   not the order tags appear in the annotation.
 * - The static `fields` shape is validated (zod) before anything is cached;
 *   a malformed shape is never cached and fails every call.
 */

import type { Logger } from "pino";
import { FieldsShapeSchema, formatShapeIssues } from "../dsl/schema";
import type { RecordType } from "../dsl/record";
import {
  DEFAULT_TAG,
  type FieldsShape,
  type FieldTags,
  type ValueType,
} from "../dsl/types";
import { UnsupportedDestinationError } from "../errors/BindError";

export type FieldDescriptor = Readonly<{
  index: number;
  name: string;
  type: ValueType;
  tags: FieldTags;
  hasDefault: boolean;
  defaultValue?: string;
  sourceTags: readonly string[];
  transformTags: readonly string[];
}>;

const EMPTY_SHAPE: FieldsShape = Object.freeze({});

export class StructureCache {
  private readonly descriptors = new Map<
    RecordType,
    readonly FieldDescriptor[]
  >();
  private readonly shapes = new Map<RecordType, FieldsShape>();

  constructor(
    private readonly sourceTags: readonly string[],
    private readonly transformTags: readonly string[],
    private readonly log?: Logger
  ) {}

  /** Descriptors for `type`, built and cached on first call. */
  public fields(type: RecordType): readonly FieldDescriptor[] {
    const cached = this.descriptors.get(type);
    if (cached) return cached;

    const shape = this.shape(type);
    const built = Object.freeze(this.build(shape));
    this.descriptors.set(type, built);

    this.log?.debug(
      {
        type: type.name,
        declared: Object.keys(shape).length,
        bound: built.length,
      },
      "structure cached"
    );
    return built;
  }

  /** The validated static shape of `type`; {} when it declares none. */
  public shape(type: RecordType): FieldsShape {
    const cached = this.shapes.get(type);
    if (cached) return cached;

    const raw: unknown = Reflect.get(type, "fields");
    if (raw === undefined) {
      this.shapes.set(type, EMPTY_SHAPE);
      return EMPTY_SHAPE;
    }

    const parsed = FieldsShapeSchema.safeParse(raw);
    if (!parsed.success) {
      throw new UnsupportedDestinationError(
        type.name || "anonymous",
        `invalid field shape: ${formatShapeIssues(parsed.error)}`
      );
    }

    const shape = Object.freeze(parsed.data);
    this.shapes.set(type, shape);
    return shape;
  }

  public size(): number {
    return this.descriptors.size;
  }

  private build(shape: FieldsShape): FieldDescriptor[] {
    const out: FieldDescriptor[] = [];

    Object.entries(shape).forEach(([name, def], index) => {
      const tags = Object.freeze({ ...def.tags });
      const declared = (tag: string) => Object.hasOwn(tags, tag);
      const sourceTags = this.sourceTags.filter(declared);
      const transformTags = this.transformTags.filter(declared);
      const defaultValue = tags[DEFAULT_TAG];
      const hasDefault = defaultValue !== undefined;

      if (!sourceTags.length && !transformTags.length && !hasDefault) return;

      out.push(
        Object.freeze({
          index,
          name,
          type: def.type,
          tags,
          hasDefault,
          defaultValue,
          sourceTags: Object.freeze(sourceTags),
          transformTags: Object.freeze(transformTags),
        })
      );
    });

    return out;
  }
}
