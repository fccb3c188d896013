import { z } from 'zod';
import { errorEntrySchema } from '../../core/checkResponse.js';
import { optionalField } from '../../utils/schema.js';

// Every field is optional: eBay omits or nulls whatever doesn't apply to a listing,
// and field groups decide which parts are returned at all.

export const amountSchema = z.object({
  value: optionalField(z.string()),
  currency: optionalField(z.string()),
  convertedFromValue: optionalField(z.string()),
  convertedFromCurrency: optionalField(z.string()),
});

export const imageSchema = z.object({
  imageUrl: optionalField(z.string()),
  height: optionalField(z.number()),
  width: optionalField(z.number()),
});

export const sellerSchema = z.object({
  username: optionalField(z.string()),
  feedbackPercentage: optionalField(z.string()),
  feedbackScore: optionalField(z.number()),
  sellerAccountType: optionalField(z.string()),
});

export const itemLocationSchema = z.object({
  addressLine1: optionalField(z.string()),
  city: optionalField(z.string()),
  stateOrProvince: optionalField(z.string()),
  postalCode: optionalField(z.string()),
  country: optionalField(z.string()),
});

export const shippingOptionSchema = z.object({
  shippingCarrierCode: optionalField(z.string()),
  shippingServiceCode: optionalField(z.string()),
  shippingCostType: optionalField(z.string()),
  shippingCost: optionalField(amountSchema),
  type: optionalField(z.string()),
  minEstimatedDeliveryDate: optionalField(z.string()),
  maxEstimatedDeliveryDate: optionalField(z.string()),
});

export const estimatedAvailabilitySchema = z.object({
  estimatedAvailabilityStatus: optionalField(z.string()),
  estimatedAvailableQuantity: optionalField(z.number()),
  estimatedSoldQuantity: optionalField(z.number()),
  deliveryOptions: optionalField(z.array(z.string())),
});

export const itemSchema = z.object({
  itemId: optionalField(z.string()),
  legacyItemId: optionalField(z.string()),
  sellerItemRevision: optionalField(z.string()),
  title: optionalField(z.string()),
  subtitle: optionalField(z.string()),
  shortDescription: optionalField(z.string()),
  description: optionalField(z.string()),
  price: optionalField(amountSchema),
  currentBidPrice: optionalField(amountSchema),
  bidCount: optionalField(z.number()),
  categoryPath: optionalField(z.string()),
  categoryId: optionalField(z.string()),
  condition: optionalField(z.string()),
  conditionId: optionalField(z.string()),
  itemWebUrl: optionalField(z.string()),
  itemAffiliateWebUrl: optionalField(z.string()),
  itemEndDate: optionalField(z.string()),
  image: optionalField(imageSchema),
  additionalImages: optionalField(z.array(imageSchema)),
  seller: optionalField(sellerSchema),
  itemLocation: optionalField(itemLocationSchema),
  brand: optionalField(z.string()),
  mpn: optionalField(z.string()),
  gtin: optionalField(z.string()),
  epid: optionalField(z.string()),
  color: optionalField(z.string()),
  size: optionalField(z.string()),
  buyingOptions: optionalField(z.array(z.string())),
  shippingOptions: optionalField(z.array(shippingOptionSchema)),
  estimatedAvailabilities: optionalField(z.array(estimatedAvailabilitySchema)),
  topRatedBuyingExperience: optionalField(z.boolean()),
  primaryItemGroup: optionalField(
    z.object({
      itemGroupId: optionalField(z.string()),
      itemGroupType: optionalField(z.string()),
      itemGroupHref: optionalField(z.string()),
      itemGroupTitle: optionalField(z.string()),
    }),
  ),
});

export const compactItemSchema = z.object({
  itemId: optionalField(z.string()),
  sellerItemRevision: optionalField(z.string()),
  price: optionalField(amountSchema),
  itemEndDate: optionalField(z.string()),
  shippingOptions: optionalField(z.array(shippingOptionSchema)),
  estimatedAvailabilities: optionalField(z.array(estimatedAvailabilitySchema)),
});

export const itemsByGroupSchema = z.object({
  items: optionalField(z.array(itemSchema)),
  commonDescriptions: optionalField(
    z.array(
      z.object({
        description: optionalField(z.string()),
        itemIds: optionalField(z.array(z.string())),
      }),
    ),
  ),
  warnings: optionalField(z.array(errorEntrySchema)),
});

export const itemSummarySchema = z.object({
  itemId: optionalField(z.string()),
  legacyItemId: optionalField(z.string()),
  title: optionalField(z.string()),
  itemHref: optionalField(z.string()),
  itemWebUrl: optionalField(z.string()),
  price: optionalField(amountSchema),
  currentBidPrice: optionalField(amountSchema),
  bidCount: optionalField(z.number()),
  image: optionalField(imageSchema),
  seller: optionalField(sellerSchema),
  condition: optionalField(z.string()),
  conditionId: optionalField(z.string()),
  categories: optionalField(
    z.array(z.object({ categoryId: optionalField(z.string()), categoryName: optionalField(z.string()) })),
  ),
  buyingOptions: optionalField(z.array(z.string())),
  itemLocation: optionalField(itemLocationSchema),
  shippingOptions: optionalField(z.array(shippingOptionSchema)),
  epid: optionalField(z.string()),
});

export const searchResultSchema = z.object({
  href: optionalField(z.string()),
  total: optionalField(z.number()),
  limit: optionalField(z.number()),
  offset: optionalField(z.number()),
  next: optionalField(z.string()),
  prev: optionalField(z.string()),
  itemSummaries: optionalField(z.array(itemSummarySchema)),
  warnings: optionalField(z.array(errorEntrySchema)),
});

export type Amount = z.infer<typeof amountSchema>;
export type Item = z.infer<typeof itemSchema>;
export type CompactItem = z.infer<typeof compactItemSchema>;
export type ItemsByGroup = z.infer<typeof itemsByGroupSchema>;
export type ItemSummary = z.infer<typeof itemSummarySchema>;
export type SearchResult = z.infer<typeof searchResultSchema>;
