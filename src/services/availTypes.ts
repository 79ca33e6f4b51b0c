/**
 * Shapes flowing through the availability pipeline:
 * AvailRequestDocument (raw, typed) -> ValidatedAvailRequest -> PricedOffer[]
 */

export interface AvailCredentialsDocument {
  username?: string;
  password?: string;
  companyId?: string;
}

export interface AvailDestination {
  code?: string;
}

export interface AvailPaxDocument {
  age?: string;
}

export interface AvailRoomDocument {
  paxes: AvailPaxDocument[];
}

/**
 * Request fields as supplied, before any business rule runs.
 * Leaf values are trimmed text; absent fields are undefined.
 */
export interface AvailRequestDocument {
  timeoutMilliseconds?: string;
  languageCode?: string;
  optionsQuota?: string;
  credentials?: AvailCredentialsDocument;
  searchType?: string;
  destinations: AvailDestination[];
  startDate?: string;
  endDate?: string;
  currency?: string;
  nationality?: string;
  market?: string;
  rooms: AvailRoomDocument[];
}

export type SearchType = "Single" | "Multiple";
export type OccupantCategory = "Child" | "Adult";

export interface Occupant {
  readonly age: number;
  readonly category: OccupantCategory;
}

export interface RoomOccupancy {
  readonly occupants: readonly Occupant[];
  readonly adults: number;
  readonly children: number;
}

export interface AvailCredentials {
  readonly username: string;
  readonly password: string;
  readonly companyId: string;
}

export interface ValidatedAvailRequest {
  /** Passed through from the request unchanged; no rule reads it. */
  readonly timeoutMilliseconds?: string;
  readonly languageCode: string;
  readonly optionsQuota: number;
  readonly credentials: AvailCredentials;
  readonly searchType: SearchType;
  readonly destinations: readonly AvailDestination[];
  readonly stayStart: Date;
  readonly stayEnd: Date;
  readonly nights: number;
  readonly currency: string;
  readonly nationality: string;
  readonly market: string;
  readonly rooms: readonly RoomOccupancy[];
}

export interface OfferPrice {
  minimumSellingPrice: number | null;
  currency: string;
  net: number;
  selling_price: number;
  selling_currency: string;
  markup: number;
  exchange_rate: number;
}

export interface PricedOffer {
  id: string;
  hotelCodeSupplier: string;
  market: string;
  price: OfferPrice;
}
