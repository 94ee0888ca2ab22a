import {
  OperationResult,
  invalid,
  succeed,
} from '../results/operation-result';

export type SortDirection = 'ASC' | 'DESC';

export interface SortInstruction<TField extends string = string> {
  field: TField;
  direction: SortDirection;
}

export interface PropertyMappingValue<TField extends string> {
  destinationProperties: readonly TField[];
  // Inverts the requested direction, e.g. "Age asc" sorts by creation date descending
  revert?: boolean;
}

type ParsedClause = { name: string; descending: boolean };

/**
 * Whitelist translating external sort names into backing entity properties.
 *
 * Built once per resource at module load and frozen. Lookups are
 * case-insensitive. Anything outside the whitelist, or any clause that is
 * not `Name`, `Name asc` or `Name desc`, rejects the whole request.
 */
export class PropertyMapping<TField extends string> {
  private readonly entries: ReadonlyMap<string, PropertyMappingValue<TField>>;
  private readonly keys: readonly string[];
  readonly defaultSort: readonly SortInstruction<TField>[];

  constructor(
    readonly resource: string,
    definition: Record<string, PropertyMappingValue<TField>>,
    defaultSort: SortInstruction<TField>[],
  ) {
    this.keys = Object.freeze(Object.keys(definition));
    this.entries = new Map(
      Object.entries(definition).map(([key, value]) => [
        key.toLowerCase(),
        Object.freeze({
          destinationProperties: Object.freeze([
            ...value.destinationProperties,
          ]),
          revert: value.revert ?? false,
        }),
      ]),
    );
    this.defaultSort = Object.freeze(
      defaultSort.map((instruction) => Object.freeze({ ...instruction })),
    );
    Object.freeze(this);
  }

  get availableKeys(): readonly string[] {
    return this.keys;
  }

  has(propertyName: string): boolean {
    return this.entries.has(propertyName.toLowerCase());
  }

  /**
   * True when every clause of `fields` names a whitelisted property.
   * An empty string is valid (the default order applies).
   */
  validMappingExistsFor(fields?: string | null): boolean {
    return this.parseClauses(fields).ok;
  }

  resolve(orderBy?: string | null): OperationResult<SortInstruction<TField>[]> {
    const parsed = this.parseClauses(orderBy);
    if (!parsed.ok) {
      return invalid(parsed.reason);
    }
    if (parsed.clauses.length === 0) {
      return succeed([...this.defaultSort]);
    }

    const instructions: SortInstruction<TField>[] = [];
    const seen = new Set<TField>();
    for (const clause of parsed.clauses) {
      const mapping = this.entries.get(clause.name.toLowerCase());
      if (!mapping) {
        return invalid(this.unknownPropertyMessage(clause.name));
      }
      const descending = mapping.revert ? !clause.descending : clause.descending;
      for (const field of mapping.destinationProperties) {
        if (seen.has(field)) continue;
        seen.add(field);
        instructions.push({ field, direction: descending ? 'DESC' : 'ASC' });
      }
    }
    return succeed(instructions);
  }

  private parseClauses(
    orderBy?: string | null,
  ):
    | { ok: true; clauses: ParsedClause[] }
    | { ok: false; reason: string } {
    if (!orderBy || orderBy.trim() === '') {
      return { ok: true, clauses: [] };
    }

    const clauses: ParsedClause[] = [];
    for (const rawClause of orderBy.split(',')) {
      const clause = rawClause.trim();
      if (clause === '') continue;

      const tokens = clause.split(/\s+/);
      if (tokens.length > 2) {
        return { ok: false, reason: `Malformed sort clause '${clause}'` };
      }

      const [name, direction] = tokens;
      if (direction !== undefined && !/^(asc|desc)$/i.test(direction)) {
        return {
          ok: false,
          reason: `Unknown sort direction '${direction}' in '${clause}'`,
        };
      }
      if (!this.has(name)) {
        return { ok: false, reason: this.unknownPropertyMessage(name) };
      }

      clauses.push({
        name,
        descending: direction?.toLowerCase() === 'desc',
      });
    }
    return { ok: true, clauses };
  }

  private unknownPropertyMessage(name: string): string {
    return (
      `Sort property '${name}' is not allowed for ${this.resource}. ` +
      `Available properties: ${this.keys.join(', ')}`
    );
  }
}
