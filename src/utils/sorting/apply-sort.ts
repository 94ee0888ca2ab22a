import { ObjectLiteral, SelectQueryBuilder } from 'typeorm';
import { SortInstruction } from './property-mapping';

/**
 * Adds resolved sort instructions to a query builder. Fields are entity
 * property names that already passed a PropertyMapping whitelist, so nothing
 * caller-supplied reaches the ORDER BY clause.
 */
export function applySort<E extends ObjectLiteral, F extends string>(
  queryBuilder: SelectQueryBuilder<E>,
  sort: readonly SortInstruction<F>[],
  tieBreaker?: string,
): SelectQueryBuilder<E> {
  const alias = queryBuilder.alias;
  sort.forEach(({ field, direction }, index) => {
    if (index === 0) {
      queryBuilder.orderBy(`${alias}.${field}`, direction);
    } else {
      queryBuilder.addOrderBy(`${alias}.${field}`, direction);
    }
  });

  if (tieBreaker && !sort.some(({ field }) => field === tieBreaker)) {
    const direction = sort[0]?.direction ?? 'ASC';
    if (sort.length === 0) {
      queryBuilder.orderBy(`${alias}.${tieBreaker}`, direction);
    } else {
      queryBuilder.addOrderBy(`${alias}.${tieBreaker}`, direction);
    }
  }
  return queryBuilder;
}
