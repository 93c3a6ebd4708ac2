import { z } from 'zod';

/**
 * DSWS Response Schemas
 *
 * Zod schemas for the payloads the service returns. Unknown keys are stripped.
 */

export const tokenResponseSchema = z.object({
  TokenValue: z.string().min(1, 'TokenValue is empty'),
  TokenExpiry: z.string().nullish(),
});

export type DswsTokenResponse = z.infer<typeof tokenResponseSchema>;

export const dswsValueSchema = z.union([z.number(), z.string(), z.boolean(), z.null()]);

export const symbolValueSchema = z.object({
  Symbol: z.string(),
  Currency: z.string().nullish(),
  Type: z.number(),
  Value: z.union([z.array(dswsValueSchema), dswsValueSchema]),
});

export const dataTypeValueSchema = z.object({
  DataType: z.string(),
  SymbolValues: z.array(symbolValueSchema).nullish(),
});

export const getDataResponseSchema = z.object({
  DataResponse: z.object({
    Dates: z.array(z.string()).nullish(),
    DataTypeValues: z.array(dataTypeValueSchema).nullish(),
  }),
});

export type DswsSymbolValue = z.infer<typeof symbolValueSchema>;
export type DswsGetDataResponse = z.infer<typeof getDataResponseSchema>;
