import { z } from 'zod';

const NullableText = z.string().nullish();

const UserProfile = z.object({
  firstName: NullableText,
  lastName: NullableText,
  email: NullableText,
});

const AuthProvider = z.object({
  type: NullableText,
  name: NullableText,
});

export const OktaUserSchema = z.object({
  id: z.string().min(1),
  profile: UserProfile.nullish(),
  credentials: z
    .object({
      provider: AuthProvider.nullish(),
    })
    .nullish(),
});

export type OktaUser = z.infer<typeof OktaUserSchema>;

export const OktaAppSchema = z.object({
  id: z.string().min(1),
  label: NullableText,
});

export type OktaApp = z.infer<typeof OktaAppSchema>;

export type JsonObject = Readonly<Record<string, unknown>>;

export const isJsonObject = (value: unknown): value is JsonObject =>
  typeof value === 'object' && value !== null && !Array.isArray(value);
