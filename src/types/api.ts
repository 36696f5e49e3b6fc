import { z } from 'zod'

// Response shapes the client reads. Objects pass unknown fields through so
// callers still see everything the service returned.

const nullableString = z.string().nullish()

export const OrganizationSchema = z
  .object({
    id: z.string().optional(),
    name: z.string(),
    subdomain: z.string(),
  })
  .passthrough()

export const ProjectSchema = z
  .object({
    id: z.string(),
    name: z.string(),
    archived_at: nullableString,
  })
  .passthrough()

export const ProjectListSchema = z.object({ projects: z.array(ProjectSchema) }).passthrough()

export const RunSchema = z
  .object({
    id: z.string(),
    title: nullableString,
    status: z.string().optional(),
    created_at: nullableString,
    completed_at: nullableString,
  })
  .passthrough()

/** JSON:API document returned by the run lookup route. */
export const RunDocumentSchema = z
  .object({
    data: z
      .object({
        id: z.string(),
        attributes: z.object({ project_id: z.string() }).passthrough(),
      })
      .passthrough(),
  })
  .passthrough()

export const PackageSchema = z
  .object({
    id: z.string(),
    name: z.string(),
    description: nullableString,
    latest_version: nullableString,
    owner: z.object({ email: nullableString }).passthrough().nullish(),
  })
  .passthrough()

export const ReleaseSchema = z.object({ id: z.string() }).passthrough()

export const ReleaseStatusSchema = z
  .object({
    validation_errors: z
      .array(z.object({ message: nullableString }).passthrough())
      .nullish()
      .transform((errors) => errors ?? []),
  })
  .passthrough()

export const ProtocolSchema = z
  .object({
    id: z.string(),
    name: z.string(),
    display_name: nullableString,
    package_id: nullableString,
  })
  .passthrough()

export const LaunchRequestSchema = z
  .object({
    id: z.string(),
    progress: z.number().nullish(),
    generation_errors: z
      .array(z.object({ message: z.string() }).passthrough())
      .nullish()
      .transform((errors) => errors ?? []),
  })
  .passthrough()

export const QuickLaunchSchema = z
  .object({
    id: z.string(),
    raw_inputs: z.unknown().optional(),
    inputs: z.unknown().optional(),
    updated_at: nullableString,
  })
  .passthrough()

const WarningSchema = z
  .object({
    message: z.string(),
    context: z.record(z.unknown()).nullish(),
  })
  .passthrough()

export const QuoteItemSchema = z
  .object({
    title: z.string(),
    cost: z.union([z.string(), z.number()]),
  })
  .passthrough()

export const AnalysisSchema = z
  .object({
    instructions: z.array(z.unknown()).default([]),
    refs: z.record(z.unknown()).default({}),
    warnings: z.array(WarningSchema).default([]),
    quote: z.object({ items: z.array(QuoteItemSchema).default([]) }).passthrough().nullish(),
    total_cost: z.union([z.string(), z.number()]).nullish(),
  })
  .passthrough()

/** Body of a 422 from the analysis route. */
export const AnalysisRejectionSchema = z
  .object({ protocol: z.array(z.object({ message: z.string() }).passthrough()) })
  .passthrough()

export const SubmittedRunSchema = z.object({ id: z.string() }).passthrough()

export const PaymentMethodSchema = z
  .object({
    id: z.string(),
    type: z.string(),
    description: nullableString,
    credit_card_type: nullableString,
    credit_card_last_4: nullableString,
    expiry: nullableString,
    is_valid: z.boolean(),
    'is_default?': z.boolean().nullish(),
  })
  .passthrough()

export const UploadUriSchema = z.object({ key: z.string(), uri: z.string() }).passthrough()

export const UploadedDatasetSchema = z
  .object({ data: z.object({ id: z.string() }).passthrough() })
  .passthrough()

export const SearchResultsSchema = z
  .object({ results: z.array(z.record(z.unknown())).default([]) })
  .passthrough()

const ResourceRefSchema = z.object({ id: z.string(), name: z.string() }).passthrough()

export const KitResultsSchema = z
  .object({
    results: z
      .array(
        z
          .object({
            vendor: z.object({ name: z.string() }).passthrough().nullish(),
            kit_items: z
              .array(
                z
                  .object({
                    provisionable: z.boolean(),
                    reservable: z.boolean(),
                    resource: ResourceRefSchema,
                  })
                  .passthrough(),
              )
              .default([]),
          })
          .passthrough(),
      )
      .default([]),
  })
  .passthrough()

export const ResourceResultsSchema = z
  .object({ results: z.array(ResourceRefSchema).default([]) })
  .passthrough()

export const SignInSchema = z
  .object({
    id: z.string().optional(),
    email: z.string(),
    authentication_token: nullableString,
    test_mode_authentication_token: nullableString,
    feature_groups: z.array(z.string()).nullish(),
    organizations: z.array(OrganizationSchema).default([]),
  })
  .passthrough()

export const JsonObjectSchema = z.record(z.unknown())

export type TOrganization = z.infer<typeof OrganizationSchema>
export type TProject = z.infer<typeof ProjectSchema>
export type TRun = z.infer<typeof RunSchema>
export type TRunDocument = z.infer<typeof RunDocumentSchema>
export type TPackage = z.infer<typeof PackageSchema>
export type TRelease = z.infer<typeof ReleaseSchema>
export type TReleaseStatus = z.infer<typeof ReleaseStatusSchema>
export type TProtocol = z.infer<typeof ProtocolSchema>
export type TLaunchRequest = z.infer<typeof LaunchRequestSchema>
export type TQuickLaunch = z.infer<typeof QuickLaunchSchema>
export type TAnalysis = z.infer<typeof AnalysisSchema>
export type TQuoteItem = z.infer<typeof QuoteItemSchema>
export type TSubmittedRun = z.infer<typeof SubmittedRunSchema>
export type TPaymentMethod = z.infer<typeof PaymentMethodSchema>
export type TUploadUri = z.infer<typeof UploadUriSchema>
export type TUploadedDataset = z.infer<typeof UploadedDatasetSchema>
export type TSearchResults = z.infer<typeof SearchResultsSchema>
export type TKitResults = z.infer<typeof KitResultsSchema>
export type TResourceResults = z.infer<typeof ResourceResultsSchema>
export type TSignIn = z.infer<typeof SignInSchema>
export type TJsonObject = z.infer<typeof JsonObjectSchema>

/** An Autoprotocol document as submitted to the service. */
export type TProtocolDocument = Record<string, unknown>
