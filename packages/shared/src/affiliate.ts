export type AffiliateLinkResult =
  | { ok: true; url: string }
  | { ok: false; reason: 'missing_associate_tag' | 'invalid_url' };

function tryParseUrl(input: string): URL | null {
  try {
    return new URL(input);
  } catch {
    return null;
  }
}

/**
 * Build the outbound product URL for a post. This is the ONLY place outbound affiliate URLs
 * are built, so a single config change updates every post.
 */
export function buildAffiliateUrl(params: {
  productId: string;
  productUrl?: string | null;
  baseUrl: string;
  associateTag?: string | null;
}): AffiliateLinkResult {
  const { productId, productUrl, baseUrl, associateTag } = params;
  const raw = productUrl ?? `${baseUrl}${encodeURIComponent(productId)}`;
  const parsed = tryParseUrl(raw);
  if (!parsed) return { ok: false, reason: 'invalid_url' };
  if (!associateTag) return { ok: false, reason: 'missing_associate_tag' };

  parsed.searchParams.set('tag', associateTag);
  return { ok: true, url: parsed.toString() };
}

/** Affiliate URL when a tag is configured, otherwise the plain product URL. */
export function outboundUrlFor(params: {
  productId: string;
  productUrl?: string | null;
  baseUrl: string;
  associateTag?: string | null;
}): string {
  const res = buildAffiliateUrl(params);
  if (res.ok) return res.url;
  return params.productUrl ?? `${params.baseUrl}${encodeURIComponent(params.productId)}`;
}
