type IdPrefix = 'auct' | 'bid' | 'item';

/**
 * Record ids look like `auct_1767225600000_k3x9qa`: entity prefix, creation
 * time in ms, six base-36 characters
 */
function generateId(prefix: IdPrefix): string {
  const suffix = Math.random().toString(36).slice(2, 8).padEnd(6, '0');
  return [prefix, Date.now(), suffix].join('_');
}

export const generateAuctionId = (): string => generateId('auct');
export const generateBidId = (): string => generateId('bid');
export const generateItemId = (): string => generateId('item');
