import { z } from 'zod';

export const SslSettingsSchema = z.object({
  /** When false, any server certificate is accepted. */
  sslVerify: z.boolean().default(true),
  /** Client certificate: a PEM file path or a subject name in the store. */
  sslCertificate: z.string().min(1).optional(),
  /** Ask the credential helper for the certificate's key password. */
  sslCertPasswordProtected: z.boolean().default(false),
});

export const UserAgentSchema = z.object({
  product: z.string().min(1),
  version: z.string().min(1),
});

export const RequestorConfigSchema = z.object({
  /** Time allowed for a response's headers to arrive, in milliseconds. */
  timeoutMs: z.number().int().positive().default(300_000),
  ssl: SslSettingsSchema.default({}),
  userAgent: UserAgentSchema,
  /** Directory searched when `ssl.sslCertificate` is not a file. */
  certificateStorePath: z.string().min(1).optional(),
  /** Extra PEM roots trusted when checking client certificate validity. */
  trustedCertificates: z.array(z.string()).default([]),
});

export type SslSettings = z.infer<typeof SslSettingsSchema>;
export type UserAgent = z.infer<typeof UserAgentSchema>;
export type RequestorConfig = z.infer<typeof RequestorConfigSchema>;
export type RequestorConfigInput = z.input<typeof RequestorConfigSchema>;

export class RequestorConfigError extends Error {
  public readonly issues: Array<z.ZodIssue>;

  constructor(issues: Array<z.ZodIssue>) {
    const summary = issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    super(`Invalid requestor configuration: ${summary}`);
    this.name = 'RequestorConfigError';
    this.issues = issues;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export function parseRequestorConfig(input: unknown): RequestorConfig {
  const result = RequestorConfigSchema.safeParse(input);
  if (!result.success) {
    throw new RequestorConfigError(result.error.issues);
  }
  return result.data;
}
