import { z } from "zod";

const CodeSchema = z.string().trim().min(1, "territory code must not be empty");
const IsoDateSchema = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "expected an ISO date (YYYY-MM-DD)");
const PercentSchema = z.number().min(0).max(100);

export const ContainmentEntrySchema = z.object({
  parent: CodeSchema,
  children: z.array(CodeSchema),
});

export const ContainmentCatalogSchema = z.object({
  containment: z.array(ContainmentEntrySchema),
});

/** Names are kept as ordered pairs: object keys such as "150" would be reordered by JSON.parse. */
export const LocaleTerritoryNamesSchema = z.object({
  locale: z.string().trim().min(1, "locale must not be empty"),
  territories: z.array(z.tuple([CodeSchema, z.string().min(1, "territory name must not be empty")])),
});

export const CurrencyPeriodSchema = z.object({
  code: z.string().regex(/^[A-Z]{3}$/, "expected an ISO 4217 currency code"),
  from: IsoDateSchema.optional(),
  to: IsoDateSchema.optional(),
  tender: z.boolean().optional(),
});

export const OfficialStatusSchema = z.enum(["official", "official_regional", "de_facto_official", "recognized"]);

export const LanguagePopulationSchema = z.object({
  population_percent: PercentSchema,
  official_status: OfficialStatusSchema.optional(),
  writing_percent: PercentSchema.optional(),
});

export const AttributeRecordSchema = z.object({
  population: z.number().int().nonnegative().optional(),
  gdp: z.number().int().nonnegative().optional(),
  literacy_percent: PercentSchema.optional(),
  measurement_system: z.enum(["metric", "US", "UK"]).optional(),
  temperature_measurement: z.enum(["metric", "US"]).optional(),
  paper_size: z.enum(["A4", "US-Letter"]).optional(),
  telephone_country_code: z.number().int().positive().optional(),
  currency: z.array(CurrencyPeriodSchema).default([]),
  language_population: z.record(z.string(), LanguagePopulationSchema).default({}),
});

export const TerritoryInfoCatalogSchema = z.object({
  territories: z.record(CodeSchema, AttributeRecordSchema.nullable()),
});

export type ContainmentEntry = z.infer<typeof ContainmentEntrySchema>;
export type LocaleTerritoryNames = z.infer<typeof LocaleTerritoryNamesSchema>;
export type CurrencyPeriod = z.infer<typeof CurrencyPeriodSchema>;
export type OfficialStatus = z.infer<typeof OfficialStatusSchema>;
export type LanguagePopulation = z.infer<typeof LanguagePopulationSchema>;
export type AttributeRecord = z.infer<typeof AttributeRecordSchema>;
