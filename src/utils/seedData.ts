import { itemCatalog } from '../services/itemCatalog';
import { CreateItemInput } from '../types';
import { logger } from './logger';

const DEMO_SELLERS: Record<string, CreateItemInput[]> = {
  'seller-alice': [
    { code: 'ALC-001', name: 'Brass desk lamp', description: 'Working condition, original shade', basePrice: 25 },
    { code: 'ALC-002', name: 'Oak bookend pair', description: 'Hand carved, light wear', basePrice: 12.5 },
  ],
  'seller-bob': [
    { code: 'BOB-001', name: 'Film camera', description: '35mm rangefinder with case', basePrice: 80 },
  ],
};

/**
 * Seed demo items for development (the in-memory store starts empty)
 */
export async function seedInitialData(): Promise<void> {
  logger.info('Seeding initial data...');

  let created = 0;
  for (const [sellerId, items] of Object.entries(DEMO_SELLERS)) {
    for (const input of items) {
      const item = await itemCatalog.createItem(sellerId, input);
      logger.info(`✅ Created item: ${item.code} for ${sellerId} (${item.id})`);
      created++;
    }
  }

  logger.info(`🎉 Seed data created: ${created} items`);
}
