/**
 * Auction status enum
 */
export enum AuctionStatus {
  OPEN = 'OPEN',       // Accepting bids until the deadline
  CLOSED = 'CLOSED',   // Closed by its creator, winner fixed (or none)
}

/**
 * Item entity - a seller-owned unit that can be bundled into an auction
 *
 * Availability is never stored; see ItemCatalog.isAvailable
 */
export interface Item {
  id: string;
  code: string;                 // Unique across all items
  name: string;
  description: string;
  imageRef: string | null;      // Reference handed over by the image store
  basePrice: number;            // In cents
  ownerId: string;
}

/**
 * Auction entity
 */
export interface Auction {
  id: string;
  initialPrice: number;         // In cents, sum of the linked items' base prices
  minimumBidIncrement: number;  // In cents (always a whole number of currency units)
  deadline: Date;
  createdAt: Date;
  creatorId: string;
  status: AuctionStatus;
  winnerId: string | null;
  winningPrice: number | null;  // In cents
}

/**
 * Bid entity
 */
export interface Bid {
  id: string;
  auctionId: string;
  bidderId: string;
  amount: number;               // In cents
  timestamp: Date;              // Admission time
}

/**
 * Winner data written when an auction closes; both null when nobody bid
 */
export type CloseOutcome =
  | { winnerId: string; winningPrice: number }
  | { winnerId: null; winningPrice: null };

/**
 * Source of the current instant, injectable for tests
 */
export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

/**
 * Input for creating an item
 */
export interface CreateItemInput {
  code: string;
  name: string;
  description: string;
  imageRef?: string | null;
  basePrice: number;            // Decimal currency units (e.g. 12.50)
}

/**
 * Input for creating an auction
 */
export interface CreateAuctionInput {
  creatorId: string;
  itemIds: string[];
  minimumBidIncrement: number;  // Whole currency units, integer >= 1
  deadline: Date;
}

/**
 * Input for placing a bid
 */
export interface PlaceBidInput {
  auctionId: string;
  bidderId: string;
  amount: number;               // Decimal currency units
}

/**
 * Input for closing an auction
 */
export interface CloseAuctionInput {
  auctionId: string;
  requesterId: string;
  now?: Date;
}

/**
 * Everything a detail page needs about one auction
 */
export interface AuctionDetails {
  auction: Auction;
  items: Item[];
  bids: Bid[];                  // Most recent first
  highestBid: Bid | null;
  minimumNextBid: number | null; // In cents, null once closed
  timeRemaining: string;
}

/**
 * Error codes
 */
export enum ErrorCode {
  // Auction errors
  AUCTION_NOT_FOUND = 'AUCTION_NOT_FOUND',
  AUCTION_NOT_OPEN = 'AUCTION_NOT_OPEN',
  AUCTION_EXPIRED = 'AUCTION_EXPIRED',
  ALREADY_CLOSED = 'ALREADY_CLOSED',
  DEADLINE_NOT_REACHED = 'DEADLINE_NOT_REACHED',
  NOT_AUCTION_CREATOR = 'NOT_AUCTION_CREATOR',
  AUCTION_LOCKED = 'AUCTION_LOCKED',

  // Bid errors
  BID_TOO_LOW = 'BID_TOO_LOW',
  SELF_BID = 'SELF_BID',

  // Item errors
  ITEM_NOT_FOUND = 'ITEM_NOT_FOUND',
  ITEM_UNAVAILABLE = 'ITEM_UNAVAILABLE',
  ITEM_CODE_TAKEN = 'ITEM_CODE_TAKEN',
  NOT_ITEM_OWNER = 'NOT_ITEM_OWNER',

  // Validation errors
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  INVALID_PRICE = 'INVALID_PRICE',
  INVALID_DEADLINE = 'INVALID_DEADLINE',

  // System errors
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

/**
 * Base class for every classified failure
 */
export class AuctionError extends Error {
  public code: ErrorCode;
  public statusCode: number;
  public details?: Record<string, unknown>;

  constructor(
    message: string,
    code: ErrorCode,
    statusCode: number = 400,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AuctionError';
    this.code = code;
    this.statusCode = statusCode;
    this.details = details;
  }
}

/**
 * Malformed or out-of-range input; the caller must correct and resubmit
 */
export class ValidationError extends AuctionError {
  constructor(
    message: string,
    code: ErrorCode = ErrorCode.VALIDATION_ERROR,
    details?: Record<string, unknown>
  ) {
    super(message, code, 400, details);
    this.name = 'ValidationError';
  }
}

/**
 * Referenced auction or item does not exist
 */
export class NotFoundError extends AuctionError {
  constructor(message: string, code: ErrorCode, details?: Record<string, unknown>) {
    super(message, code, 404, details);
    this.name = 'NotFoundError';
  }
}

/**
 * Actor lacks permission (not the creator/owner, or bidding on own auction)
 */
export class ForbiddenError extends AuctionError {
  constructor(message: string, code: ErrorCode, details?: Record<string, unknown>) {
    super(message, code, 403, details);
    this.name = 'ForbiddenError';
  }
}

/**
 * Operation not legal in the current auction state, including lost races
 */
export class ConflictError extends AuctionError {
  constructor(message: string, code: ErrorCode, details?: Record<string, unknown>) {
    super(message, code, 409, details);
    this.name = 'ConflictError';
  }
}

/**
 * API Success Response
 */
export interface ApiSuccessResponse<T> {
  success: true;
  data: T;
}

/**
 * API Error Response
 */
export interface ApiErrorResponse {
  success: false;
  error: {
    code: ErrorCode;
    message: string;
    details?: Record<string, unknown>;
  };
}

/**
 * API Response (union type)
 */
export type ApiResponse<T> = ApiSuccessResponse<T> | ApiErrorResponse;
