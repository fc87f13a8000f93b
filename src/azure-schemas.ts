import { z } from 'zod';

// Only the fields the reports read are declared; everything else az prints
// is passed through untouched.

export const SubscriptionSchema = z
  .object({
    id: z.string(),
    name: z.string(),
    state: z.string().optional(),
    isDefault: z.boolean().optional(),
  })
  .passthrough();

export const SubscriptionListSchema = z.array(SubscriptionSchema);

export const AccountSchema = z
  .object({
    id: z.string(),
    name: z.string(),
    tenantId: z.string(),
    user: z.object({ name: z.string().optional() }).passthrough().optional(),
  })
  .passthrough();

export const ResourceGroupSchema = z
  .object({
    name: z.string(),
    location: z.string(),
  })
  .passthrough();

export const ResourceGroupListSchema = z.array(ResourceGroupSchema);

export const ResourceSchema = z
  .object({
    name: z.string(),
    type: z.string(),
    location: z.string(),
  })
  .passthrough();

export const ResourceListSchema = z.array(ResourceSchema);

export const CognitiveKeysSchema = z
  .object({
    key1: z.string().nullish(),
    key2: z.string().nullish(),
  })
  .passthrough();

export const StorageKeyListSchema = z.array(
  z
    .object({
      keyName: z.string(),
      value: z.string(),
    })
    .passthrough(),
);

export const DeploymentSchema = z
  .object({
    name: z.string(),
    properties: z
      .object({
        model: z.object({ name: z.string().optional() }).passthrough().optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

export const DeploymentListSchema = z.array(DeploymentSchema);

/** Create calls only need to succeed; their payload is returned as-is. */
export const AnyJsonSchema = z.unknown();

export type Subscription = z.infer<typeof SubscriptionSchema>;
export type Account = z.infer<typeof AccountSchema>;
export type ResourceGroup = z.infer<typeof ResourceGroupSchema>;
export type Resource = z.infer<typeof ResourceSchema>;
export type CognitiveKeys = z.infer<typeof CognitiveKeysSchema>;
export type StorageKey = z.infer<typeof StorageKeyListSchema>[number];
export type Deployment = z.infer<typeof DeploymentSchema>;
