// Registry payloads (Companies House public data API)
// Schemas are lenient: unknown keys are dropped, null and missing fields are tolerated.

import { z } from 'zod';

function withDefault<T extends z.ZodTypeAny>(schema: T, fallback: unknown) {
  return z.preprocess((v) => v ?? fallback, schema);
}

function listOf<T extends z.ZodTypeAny>(item: T) {
  return withDefault(z.array(item), []);
}

const text = withDefault(z.string(), '');
const optionalText = z.string().nullish().transform((v) => v ?? undefined);
const flag = withDefault(z.boolean(), false);

export const AddressSchema = z.object({
  premises: optionalText,
  address_line_1: optionalText,
  address_line_2: optionalText,
  locality: optionalText,
  region: optionalText,
  postal_code: optionalText,
  country: optionalText,
});

export const CompanyProfileSchema = z.object({
  company_number: text,
  company_name: text,
  company_status: text,
  type: text,
  date_of_creation: optionalText,
  date_of_cessation: optionalText,
  registered_office_address: withDefault(AddressSchema, {}),
  sic_codes: listOf(z.string()),
  has_been_liquidated: flag,
  accounts: withDefault(z.object({
    overdue: flag,
    next_due: optionalText,
    next_accounts: withDefault(z.object({ due_on: optionalText }), {}),
  }), {}),
  confirmation_statement: withDefault(z.object({
    overdue: flag,
    next_due: optionalText,
  }), {}),
});

const OfficerLinksSchema = z.object({
  self: optionalText,
  officer: withDefault(z.object({ appointments: optionalText }), {}),
});

export const OfficerSchema = z.object({
  name: text,
  officer_role: text,
  appointed_on: optionalText,
  resigned_on: optionalText,
  links: withDefault(OfficerLinksSchema, {}),
});

export const OfficerListSchema = z.object({ items: listOf(OfficerSchema) });

const AppointedToSchema = z.object({
  company_number: text,
  company_name: text,
  company_status: text,
});

export const AppointmentSchema = z.object({
  appointed_on: optionalText,
  resigned_on: optionalText,
  officer_role: text,
  appointed_to: withDefault(AppointedToSchema, {}),
});

export const AppointmentListSchema = z.object({ items: listOf(AppointmentSchema) });

export const DisqualificationSchema = z.object({
  disqualifications: listOf(z.object({
    disqualified_from: optionalText,
    disqualified_until: optionalText,
    reason: withDefault(z.object({ description_identifier: text }), {}),
  })),
});

export const InsolvencySchema = z.object({
  cases: listOf(z.object({
    type: text,
    dates: listOf(z.object({ type: text, date: optionalText })),
  })),
});

export const PscSchema = z.object({
  name: text,
  kind: text,
  natures_of_control: listOf(z.string()),
  notified_on: optionalText,
  ceased_on: optionalText,
  nationality: optionalText,
  identification: withDefault(z.object({
    registration_number: optionalText,
    place_registered: text,
    country_registered: text,
    legal_form: optionalText,
  }), {}),
});

export const PscListSchema = z.object({ items: listOf(PscSchema) });

export const PscStatementListSchema = z.object({
  items: listOf(z.object({ statement: text, ceased_on: optionalText })),
});

export const FilingSchema = z.object({
  category: text,
  type: text,
  date: optionalText,
  description: text,
  description_values: withDefault(z.object({ made_up_date: optionalText }), {}),
});

export const FilingHistorySchema = z.object({ items: listOf(FilingSchema) });

export const ChargeSchema = z.object({
  charge_number: z.union([z.number(), z.string()]).nullish().transform((v) => v ?? undefined),
  status: text,
  created_on: optionalText,
  particulars: withDefault(z.object({
    type: optionalText,
    description: optionalText,
    floating_charge_covers_all: flag,
  }), {}),
  persons_entitled: listOf(z.object({ name: text })),
});

export const ChargeListSchema = z.object({ items: listOf(ChargeSchema) });

export type Address = z.output<typeof AddressSchema>;
export type CompanyProfile = z.output<typeof CompanyProfileSchema>;
export type Officer = z.output<typeof OfficerSchema>;
export type OfficerList = z.output<typeof OfficerListSchema>;
export type Appointment = z.output<typeof AppointmentSchema>;
export type AppointmentList = z.output<typeof AppointmentListSchema>;
export type Disqualification = z.output<typeof DisqualificationSchema>;
export type Insolvency = z.output<typeof InsolvencySchema>;
export type Psc = z.output<typeof PscSchema>;
export type PscList = z.output<typeof PscListSchema>;
export type PscStatementList = z.output<typeof PscStatementListSchema>;
export type Filing = z.output<typeof FilingSchema>;
export type FilingHistory = z.output<typeof FilingHistorySchema>;
export type Charge = z.output<typeof ChargeSchema>;
export type ChargeList = z.output<typeof ChargeListSchema>;

/** Outcome of one registry lookup: a payload, or the registry's explicit "does not exist" */
export type RegistryResult<T> =
  | { status: 'ok'; data: T }
  | { status: 'not_found' };

/**
 * The registry capability the analyzers depend on.
 * Typed accessors return null for "no data": not found, unavailable after retries, or malformed.
 */
export interface RegistryReader {
  lookupCompany(companyNumber: string): Promise<RegistryResult<CompanyProfile>>;
  getCompany(companyNumber: string): Promise<CompanyProfile | null>;
  getOfficers(companyNumber: string): Promise<OfficerList | null>;
  getAppointments(officerId: string): Promise<AppointmentList | null>;
  getDisqualifications(officerId: string): Promise<Disqualification | null>;
  getInsolvency(companyNumber: string): Promise<Insolvency | null>;
  getPscs(companyNumber: string): Promise<PscList | null>;
  getPscStatements(companyNumber: string): Promise<PscStatementList | null>;
  getFilingHistory(companyNumber: string, category?: string): Promise<FilingHistory | null>;
  getCharges(companyNumber: string): Promise<ChargeList | null>;
  getRegisteredOffice(companyNumber: string): Promise<Address | null>;
}
