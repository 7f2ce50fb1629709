import { load } from "cheerio";
import type { CheerioAPI } from "cheerio";

import { parsePriceText } from "./price";
import { normalizeBundle, parseLabeledStock, parseWholeNumber } from "./quantity";
import { ProductRecordBuilder } from "./record";
import { extractProductId, resolveHref } from "./url";
import type { ExtractContext, FieldResolver, ProductRecord } from "./types";

const LISTING_SELECTOR = "div.goods-list-item";
const TITLE_SELECTOR = ".goods-list-title";
const SERVER_INFO_SELECTOR = ".game-qufu-attr";
const PRICE_SELECTOR = ".goods-price";
const REPUTATION_SELECTOR = ".game-reputation";
const RATE_SELECTOR = ".kucun";
const LEGACY_RATE_SELECTOR = ".width233";
const BUY_BUTTON_SELECTOR = ".shop-btn-group a.im-buy-btn";
const MAX_TIER_ICONS = 5;

type TitleLink = {
  title: string;
  url: string;
};

type RatePair = {
  buy: string;
  sell: string;
};

export const TITLE_RESOLVERS: FieldResolver<TitleLink>[] = [
  {
    name: "title_link",
    resolve: ($, context) => {
      const link = $(TITLE_SELECTOR).first();
      if (link.length === 0) {
        return null;
      }
      return {
        title: link.text().trim(),
        url: resolveHref(link.attr("href") ?? "", context.baseUrl),
      };
    },
  },
];

export const SERVER_INFO_RESOLVERS: FieldResolver<string>[] = [
  {
    name: "server_tags",
    resolve: ($) => {
      const container = $(SERVER_INFO_SELECTOR).first();
      if (container.length === 0) {
        return null;
      }
      return container
        .find("a")
        .toArray()
        .map((node) => $(node).text().trim())
        .join("/");
    },
  },
];

export const PRICE_RESOLVERS: FieldResolver<number>[] = [
  {
    name: "price_text",
    resolve: ($) => {
      const node = $(PRICE_SELECTOR).first();
      return node.length > 0 ? parsePriceText(node.text()) : null;
    },
  },
];

// Current layout keeps stock in the reputation block; `.kucun span` is the older one.
export const STOCK_RESOLVERS: FieldResolver<number>[] = [
  {
    name: "reputation_label",
    resolve: ($) => {
      const reputation = $(REPUTATION_SELECTOR).first();
      return reputation.length > 0 ? parseLabeledStock(reputation.text()) : null;
    },
  },
  {
    name: "reputation_bold",
    resolve: ($) => {
      const bold = $(REPUTATION_SELECTOR).first().find(".bold").first();
      return bold.length > 0 ? parseWholeNumber(bold.text()) : null;
    },
  },
  {
    name: "legacy_kucun",
    resolve: ($) => {
      const span = $(`${RATE_SELECTOR} span`).first();
      return span.length > 0 ? parseWholeNumber(span.text()) : null;
    },
  },
];

export const RATE_RESOLVERS: FieldResolver<RatePair>[] = [
  {
    name: "kucun",
    resolve: ($) => readRatePair($, RATE_SELECTOR),
  },
  {
    name: "legacy_width233",
    resolve: ($) => {
      // Only a `.kucun` with no paragraphs at all points at the legacy layout.
      const current = $(RATE_SELECTOR).first();
      if (current.length === 0 || current.find("p").length > 0) {
        return null;
      }
      return readRatePair($, LEGACY_RATE_SELECTOR);
    },
  },
];

export const CREDIT_RATING_RESOLVERS: FieldResolver<number>[] = [
  { name: "hearts", resolve: ($) => countTierIcons($, "i.icon-heart", 0) },
  { name: "diamonds", resolve: ($) => countTierIcons($, "i.icon-bluediamond", 5) },
  { name: "crowns", resolve: ($) => countTierIcons($, "i.icon-crown", 10) },
];

export const PURCHASE_URL_RESOLVERS: FieldResolver<string>[] = [
  {
    name: "buy_button",
    resolve: ($, context) => {
      const button = $(BUY_BUTTON_SELECTOR).first();
      if (button.length === 0) {
        return null;
      }
      const href = resolveHref(button.attr("href") ?? "", context.baseUrl);
      return href || null;
    },
  },
];

export function resolveField<T>($: CheerioAPI, context: ExtractContext, resolvers: readonly FieldResolver<T>[]): T | null {
  for (const resolver of resolvers) {
    const value = resolver.resolve($, context);
    if (value !== null) {
      return value;
    }
  }
  return null;
}

/**
 * Builds a normalized record from the markup of a single `goods-list-item`.
 *
 * Every field goes through its own resolver chain and falls back to an empty value, so a
 * listing with half its markup missing still yields a record. Price and stock are
 * rescaled by the bundle quantity in the title as the last step.
 */
export function extractRecord(fragmentHtml: string, baseUrl: string): ProductRecord {
  const $ = load(fragmentHtml, null, false);
  const context: ExtractContext = { baseUrl };
  let builder = ProductRecordBuilder.create();

  const titleLink = resolveField($, context, TITLE_RESOLVERS);
  if (titleLink) {
    builder = builder.with({
      title: titleLink.title,
      url: titleLink.url,
      productId: extractProductId(titleLink.url),
    });
  }

  const rates = resolveField($, context, RATE_RESOLVERS);
  if (rates) {
    builder = builder.with({ exchangeRateBuy: rates.buy, exchangeRateSell: rates.sell });
  }

  builder = builder.with({
    serverInfo: resolveField($, context, SERVER_INFO_RESOLVERS) ?? "",
    price: resolveField($, context, PRICE_RESOLVERS) ?? 0,
    stock: resolveField($, context, STOCK_RESOLVERS) ?? 0,
    creditRating: resolveField($, context, CREDIT_RATING_RESOLVERS) ?? 0,
    purchaseUrl: resolveField($, context, PURCHASE_URL_RESOLVERS) ?? "",
  });

  const { price, stock } = normalizeBundle(builder.current);
  return builder.with({ price, stock }).build();
}

export function collectListings(pageHtml: string, baseUrl: string): ProductRecord[] {
  const $ = load(pageHtml);
  return $(LISTING_SELECTOR)
    .toArray()
    .map((node) => extractRecord($.html(node), baseUrl));
}

function readRatePair($: CheerioAPI, selector: string): RatePair | null {
  const paragraphs = $(selector).first().find("p");
  if (paragraphs.length < 2) {
    return null;
  }
  return {
    buy: paragraphs.eq(0).text().trim(),
    sell: paragraphs.eq(1).text().trim(),
  };
}

function countTierIcons($: CheerioAPI, iconSelector: string, offset: number): number | null {
  const count = Math.min($(REPUTATION_SELECTOR).first().find(iconSelector).length, MAX_TIER_ICONS);
  return count > 0 ? offset + count : null;
}
