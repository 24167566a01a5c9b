import { z } from 'zod';

// Справочники (dictionary types) и их опции, сгруппированные по (type, label).
// Идентификаторы 64-битные, поэтому по сети ходят десятичной строкой.

export const DICT_TYPE_KEY_MAX = 50;
export const DICT_NAME_MAX = 100;
export const DICT_LABEL_MAX = 100;
export const DICT_VALUE_MAX = 200;
export const DICT_PAGE_SIZE_MAX = 100;

export const DictErrorCode = {
  NotFound: 'not_found',
  Conflict: 'conflict',
  InvalidArgument: 'invalid_argument',
} as const;

export type DictErrorCode = (typeof DictErrorCode)[keyof typeof DictErrorCode];

export type DictFailure = { ok: false; code: DictErrorCode; error: string };

export type DictResult<T extends object> = ({ ok: true } & T) | DictFailure;

export type DictStatus = 0 | 1;

export type DictTypeDto = {
  id: string;
  name: string;
  type: string;
  status: DictStatus;
  created_at: number;
  updated_at: number;
};

export type DictOptionGroupDto = {
  id: string;
  dict_type_id: string;
  dict_type: string;
  label: string;
  value: string[];
  status: DictStatus;
  created_at: number;
  updated_at: number;
};

/** Removes repeated values, keeping the first occurrence of each. */
export function dedupeOptionValues(values: readonly string[]): string[] {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const v of values) {
    if (seen.has(v)) continue;
    seen.add(v);
    out.push(v);
  }
  return out;
}

export function statusToEnabled(status: DictStatus): boolean {
  return status === 1;
}

export function enabledToStatus(enabled: boolean): DictStatus {
  return enabled ? 1 : 0;
}

const statusSchema = z.union([z.literal(0), z.literal(1)]);

export const dictTypeKeySchema = z.string().trim().min(1).max(DICT_TYPE_KEY_MAX);
export const dictLabelSchema = z.string().min(1).max(DICT_LABEL_MAX);
export const dictValuesSchema = z.array(z.string().min(1).max(DICT_VALUE_MAX)).min(1);

export const dictTypeCreateSchema = z.object({
  name: z.string().min(1).max(DICT_NAME_MAX),
  type: dictTypeKeySchema,
  status: statusSchema.default(1),
});

export const dictTypeUpdateSchema = z
  .object({
    name: z.string().min(1).max(DICT_NAME_MAX).optional(),
    type: dictTypeKeySchema.optional(),
    status: statusSchema.optional(),
  })
  .refine((v) => v.name !== undefined || v.type !== undefined || v.status !== undefined, {
    message: 'nothing to update',
  });

export const dictOptionCreateSchema = z.object({
  dict_type: dictTypeKeySchema,
  label: dictLabelSchema,
  value: dictValuesSchema,
  status: statusSchema.default(1),
});

export const dictOptionUpdateSchema = z
  .object({
    label: dictLabelSchema.optional(),
    value: dictValuesSchema.optional(),
    status: statusSchema.optional(),
  })
  .refine((v) => v.label !== undefined || v.value !== undefined || v.status !== undefined, {
    message: 'nothing to update',
  });

// Query-string values arrive as strings.
const pageFields = {
  page: z.coerce.number().int().min(1).default(1),
  page_size: z.coerce.number().int().min(1).max(DICT_PAGE_SIZE_MAX).default(10),
  status: z.enum(['0', '1']).transform((s): DictStatus => (s === '1' ? 1 : 0)).optional(),
} as const;

export const dictTypeQuerySchema = z.object({
  ...pageFields,
  type: dictTypeKeySchema.optional(),
});

export const dictOptionQuerySchema = z.object({
  ...pageFields,
  dict_type: dictTypeKeySchema.optional(),
});

export const dictImportFileSchema = z.object({
  dict_type: z.object({
    name: z.string().min(1).max(DICT_NAME_MAX),
    type: dictTypeKeySchema,
    status: statusSchema.default(1),
  }),
  options: z
    .array(
      z.object({
        label: dictLabelSchema,
        value: z.string().min(1).max(DICT_VALUE_MAX),
        status: statusSchema.default(1),
      }),
    )
    .default([]),
});

export type DictImportFile = z.infer<typeof dictImportFileSchema>;
