/**
 * Closed product classification shared by the catalog loader, persisted documents and the query filter.
 * Adding a member here is the only edit needed for the three to stay in lock-step.
 */
export const productTypes = [
  "GPU",
  "TRANSCEIVER",
  "CABLING",
  "NETWORK_CARD",
  "SOFTWARE",
] as const;

export type ProductType = (typeof productTypes)[number];

export const isProductType = (value: string): value is ProductType =>
  productTypes.some((productType) => productType === value);

export type DocumentEntity = {
  id: string;
  productType: ProductType;
  sourceUrl: string;
  title: string;
  headings: string[];
  bodyText: string;
  fetchedAt: Date;
};

/**
 * Extracted page content before the store assigns identity.
 */
export type DocumentDraft = Omit<DocumentEntity, "id">;

export const emptyProductTypeCounts = (): Record<ProductType, number> => ({
  GPU: 0,
  TRANSCEIVER: 0,
  CABLING: 0,
  NETWORK_CARD: 0,
  SOFTWARE: 0,
});
