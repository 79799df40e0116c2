import { z } from 'zod';

import { ValidationError } from '../errors.js';

export const RegistrationWireSchema = z
  .object({
    ServiceName: z
      .string()
      .max(256)
      .refine((name) => name.trim().length > 0, 'ServiceName must not be empty'),
    ServiceUrl: z.string().min(1, 'ServiceUrl must not be empty').max(2048),
    RequiredServices: z
      .array(
        z
          .string()
          .max(256)
          .refine((name) => name.trim().length > 0, 'RequiredServices entries must not be empty')
      )
      .max(256)
      .nullish()
      .transform((names) => [...new Set(names ?? [])]),
    ServiceUpdateUrl: z.string().max(2048).default(''),
    HeartbeatUrl: z.string().url('HeartbeatUrl must be a URL').max(2048)
  })
  .superRefine((value, ctx) => {
    if (value.RequiredServices.length === 0) {
      return;
    }

    if (!z.string().url().safeParse(value.ServiceUpdateUrl).success) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['ServiceUpdateUrl'],
        message: 'ServiceUpdateUrl must be a URL when RequiredServices is not empty'
      });
    }
  })
  .transform(
    (value): Registration => ({
      serviceName: value.ServiceName,
      serviceUrl: value.ServiceUrl,
      requiredServices: value.RequiredServices,
      serviceUpdateUrl: value.ServiceUpdateUrl,
      heartbeatUrl: value.HeartbeatUrl
    })
  );

export interface Registration {
  readonly serviceName: string;
  readonly serviceUrl: string;
  readonly requiredServices: readonly string[];
  readonly serviceUpdateUrl: string;
  readonly heartbeatUrl: string;
}

export interface PatchEntry {
  readonly name: string;
  readonly url: string;
}

export interface Patch {
  readonly added: readonly PatchEntry[];
  readonly removed: readonly PatchEntry[];
}

export interface WirePatch {
  Added: Array<{ Name: string; Url: string }>;
  Removed: Array<{ Name: string; Url: string }>;
}

export function parseRegistration(payload: unknown): Registration {
  const parsed = RegistrationWireSchema.safeParse(payload);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
    );
    throw new ValidationError(`Invalid registration: ${issues.join('; ')}`, issues);
  }

  return parsed.data;
}

export function entryOf(registration: Registration): PatchEntry {
  return { name: registration.serviceName, url: registration.serviceUrl };
}

export function isEmptyPatch(patch: Patch): boolean {
  return patch.added.length === 0 && patch.removed.length === 0;
}

export function filterPatch(patch: Patch, name: string): Patch {
  return {
    added: patch.added.filter((entry) => entry.name === name),
    removed: patch.removed.filter((entry) => entry.name === name)
  };
}

export function encodePatch(patch: Patch): WirePatch {
  return {
    Added: patch.added.map((entry) => ({ Name: entry.name, Url: entry.url })),
    Removed: patch.removed.map((entry) => ({ Name: entry.name, Url: entry.url }))
  };
}
