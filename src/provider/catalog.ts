/**
 * Data sources and resources served by the provider. Each handler receives the
 * ClientHandle produced by `Provider.configure`.
 */
export const DATA_SOURCES: readonly string[] = [
    'tencentcloud_cos_bucket_object',
    'tencentcloud_cos_buckets',
    'tencentcloud_audit_cos_regions',
];

export const RESOURCES: readonly string[] = [
    'tencentcloud_cos_bucket',
    'tencentcloud_cos_bucket_object',
    'tencentcloud_cos_bucket_policy',
];
