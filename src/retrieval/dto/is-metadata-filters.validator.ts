import { buildMessage, ValidateBy, type ValidationOptions } from 'class-validator';
import { isFilterValue } from '../utils/metadata-filter';

/**
 * Plain object whose values are a string, a number or a non-empty array of them.
 * Field names are checked by the pipeline, which rejects unknown ones.
 */
export function IsMetadataFilters(
  validationOptions?: ValidationOptions,
): PropertyDecorator {
  return ValidateBy(
    {
      name: 'isMetadataFilters',
      validator: {
        validate: (value: unknown): boolean => isFilterMap(value),
        defaultMessage: buildMessage(
          (eachPrefix) =>
            `${eachPrefix}$property must map metadata fields to a string, a number or an array of them`,
          validationOptions,
        ),
      },
    },
    validationOptions,
  );
}

function isFilterMap(value: unknown): boolean {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false;
  }

  return Object.values(value).every((entry: unknown) =>
    Array.isArray(entry)
      ? entry.length > 0 && entry.every((item: unknown) => isFilterValue(item))
      : isFilterValue(entry),
  );
}
