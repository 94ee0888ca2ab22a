import { ValidationError } from 'class-validator';

/**
 * Flattens class-validator errors into a single line such as
 * `fileName: fileName should not be empty; extension: ...`.
 */
export function describeErrors(errors: ValidationError[], prefix = ''): string {
  return errors
    .map((error) => {
      const path = prefix ? `${prefix}.${error.property}` : error.property;
      if ((error.children?.length ?? 0) > 0) {
        return describeErrors(error.children ?? [], path);
      }
      return `${path}: ${Object.values(error.constraints ?? {}).join(', ')}`;
    })
    .join('; ');
}
