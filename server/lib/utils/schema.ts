import { z } from "zod";

/**
 * Array whose elements are parsed one by one; elements that fail `item` are
 * dropped instead of failing the whole array. A missing array reads as [].
 */
export function validItems<T extends z.ZodTypeAny>(item: T) {
  return z.array(z.unknown()).default([]).transform(values =>
    values.flatMap((value): z.output<T>[] => {
      const parsed = item.safeParse(value);
      return parsed.success ? [parsed.data] : [];
    })
  );
}
