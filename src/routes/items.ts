import { Router, Request, Response } from 'express';
import { itemCatalog } from '../services/itemCatalog';
import { handleError } from './handleError';
import { serializeItem } from '../utils/serializers';
import { optionalString, requireNumber, requireString } from '../utils/validation';

const router = Router();

/**
 * POST /api/items
 * Register an item for a seller
 */
router.post('/', async (req: Request, res: Response) => {
  try {
    const { sellerId, code, name, description, imageRef, basePrice } = req.body;

    const item = await itemCatalog.createItem(requireString(sellerId, 'sellerId'), {
      code: requireString(code, 'code'),
      name: requireString(name, 'name'),
      description: requireString(description, 'description'),
      imageRef: optionalString(imageRef, 'imageRef') ?? null,
      basePrice: requireNumber(basePrice, 'basePrice'),
    });

    res.status(201).json({
      success: true,
      data: serializeItem(item),
    });
  } catch (error) {
    handleError(error, res);
  }
});

/**
 * GET /api/items/available?sellerId=
 * Items the seller can still put into a new auction
 */
router.get('/available', async (req: Request, res: Response) => {
  try {
    const sellerId = requireString(req.query.sellerId, 'sellerId');
    const items = await itemCatalog.availableItemsForSeller(sellerId);

    res.json({
      success: true,
      data: items.map(serializeItem),
      count: items.length,
    });
  } catch (error) {
    handleError(error, res);
  }
});

/**
 * GET /api/items/:id
 */
router.get('/:id', async (req: Request, res: Response) => {
  try {
    const item = await itemCatalog.getItem(req.params.id);
    const available = await itemCatalog.isAvailable(item.id);

    res.json({
      success: true,
      data: { ...serializeItem(item), available },
    });
  } catch (error) {
    handleError(error, res);
  }
});

export default router;
