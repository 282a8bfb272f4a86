import { outboundUrlFor, type Candidate } from '@dealrelay/shared';

export const MAX_POST_LENGTH = 280;
const MAX_TITLE_LENGTH = 100;

export type PostLinkConfig = {
  productBaseUrl: string;
  associateTag?: string | null;
};

type PostParts = {
  title: string;
  discount: number;
  was: string;
  now: string;
  save: string;
  url: string;
};

type Template = (p: PostParts) => string;

const GENERAL: Template[] = [
  (p) => `🔥 ${p.discount}% OFF DEAL!\n\n${p.title}\n\nWas: ${p.was}\nNow: ${p.now}\nSave: ${p.save}\n\n${p.url}\n\n#Deals #Sale #Discount`,
  (p) => `⚡ FLASH DEAL ⚡\n\n${p.title}\n\n💰 ${p.discount}% OFF (${p.save} savings)\n${p.was} ➡️ ${p.now}\n\n${p.url}\n\n#Deals #Savings`,
  (p) => `🔥 LIMITED TIME: ${p.discount}% OFF!\n\n${p.title}\n\nPrice Drop: ${p.was} ➡️ ${p.now}\nYour Savings: ${p.save}\n\n${p.url}\n\n#DealAlert #PriceDrop`,
];

const BEAUTY: Template[] = [
  (p) => `✨ BEAUTY STEAL ALERT ✨\n\n${p.title}\n\n🔥 ${p.discount}% OFF\nWas: ${p.was} ➡️ Now: ${p.now}\nSave: ${p.save}\n\n${p.url}\n\n#BeautyDeals #MakeupSale #BeautyFinds`,
  (p) => `💄 GLOW UP FOR LESS 💄\n\n${p.title}\n\n💰 ${p.discount}% OFF (${p.save} savings!)\n${p.was} ➡️ ${p.now}\n\n${p.url}\n\n#BeautyOnABudget #SkincareDeals`,
  (p) => `🌟 BEAUTY BARGAIN 🌟\n\n${p.title}\n\n🔥 Limited Time: ${p.discount}% OFF\nPrice Drop: ${p.was} ➡️ ${p.now}\nYour Savings: ${p.save}\n\n${p.url}\n\n#BeautyBargain #MakeupFinds`,
  (p) => `💅 STUNNING DEAL 💅\n\n${p.title}\n\n🔥 ${p.discount}% OFF FLASH SALE\nNormal: ${p.was}\nSale: ${p.now}\nSave: ${p.save}\n\n${p.url}\n\n#BeautyDeals #GlowForLess`,
];

/** Counted in code points, so an emoji is one character. */
export function postLength(text: string): number {
  return Array.from(text).length;
}

function truncate(s: string, max: number): string {
  const chars = Array.from(s);
  if (chars.length <= max) return s;
  if (max <= 3) return chars.slice(0, Math.max(0, max)).join('');
  return `${chars.slice(0, max - 3).join('').trimEnd()}...`;
}

export function cleanTitle(raw: string): string {
  const title = raw
    .replace(/\s+/g, ' ')
    .replace(/\([^)]*\)/g, '')
    .replace(/\[[^\]]*\]/g, '')
    .replace(/amazon\.com\s*:?\s*/gi, '')
    .replace(/\s+/g, ' ')
    .trim();
  return truncate(title, MAX_TITLE_LENGTH);
}

const money = (n: number) => `$${n.toFixed(2)}`;

/**
 * Post text for one deal. The template rotates with the UTC hour; niche deals get the niche
 * variants. Only the title is shortened to fit the length cap.
 */
export function formatDealPost(
  c: Candidate,
  link: PostLinkConfig,
  opts: { niche?: string | null; now?: Date } = {},
): string {
  const now = opts.now ?? new Date();
  const templates = opts.niche === 'beauty' ? BEAUTY : GENERAL;
  const template = templates[now.getUTCHours() % templates.length] ?? GENERAL[0];
  if (!template) throw new Error('no post templates');

  const reference = c.referencePrice ?? c.currentPrice;
  const parts: PostParts = {
    title: cleanTitle(c.title),
    discount: Math.trunc(c.discountPercent),
    was: money(reference),
    now: money(c.currentPrice),
    save: money(Math.max(0, reference - c.currentPrice)),
    url: outboundUrlFor({
      productId: c.productId,
      productUrl: c.productUrl,
      baseUrl: link.productBaseUrl,
      associateTag: link.associateTag,
    }),
  };

  const text = template(parts);
  const overflow = postLength(text) - MAX_POST_LENGTH;
  if (overflow <= 0) return text;
  const titleLength = postLength(parts.title);
  return template({ ...parts, title: truncate(parts.title, Math.max(0, titleLength - overflow)) });
}
