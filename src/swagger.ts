import swaggerJsdoc from 'swagger-jsdoc';

const errorResponse = (description: string) => ({
  description,
  content: {
    'application/json': {
      schema: { $ref: '#/components/schemas/ErrorResponse' },
    },
  },
});

const dataResponse = (description: string, schema: Record<string, unknown>) => ({
  description,
  content: {
    'application/json': {
      schema: {
        type: 'object',
        properties: {
          success: { type: 'boolean', example: true },
          data: schema,
        },
      },
    },
  },
});

const idParam = {
  name: 'id',
  in: 'path',
  required: true,
  schema: { type: 'string' },
};

const options: swaggerJsdoc.Options = {
  definition: {
    openapi: '3.0.0',
    info: {
      title: 'Lot Auction API',
      version: '1.0.0',
      description: `
# Auction API

Sellers bundle their items into auctions; other users bid until the
deadline; the creator then closes the auction and the leading bid wins.

## Flow

1. **Register items** → POST /api/items
2. **Create an auction** from available items → POST /api/auctions
3. **Place bids** → POST /api/bids
4. **Close** after the deadline → POST /api/auctions/:id/close

## Money Format
All amounts are decimals with 2-digit precision (e.g., 12.50).
The minimum bid increment is a whole number of currency units.
      `,
    },
    servers: [
      {
        url: 'http://localhost:3000',
        description: 'Development server',
      },
    ],
    tags: [
      { name: 'Items', description: 'Seller items and availability' },
      { name: 'Auctions', description: 'Auction lifecycle' },
      { name: 'Bids', description: 'Bidding (serialized per auction)' },
      { name: 'Admin', description: 'Operational statistics' },
    ],
    components: {
      schemas: {
        Item: {
          type: 'object',
          properties: {
            id: { type: 'string', example: 'item_1760000000000_abc123' },
            code: { type: 'string', example: 'LMP-001' },
            name: { type: 'string', example: 'Brass desk lamp' },
            description: { type: 'string', example: 'Working condition, original shade' },
            imageRef: { type: 'string', nullable: true, example: 'images/lmp-001.jpg' },
            basePrice: { type: 'number', example: 25.5 },
            ownerId: { type: 'string', example: 'seller-1' },
          },
        },
        CreateItemRequest: {
          type: 'object',
          required: ['sellerId', 'code', 'name', 'description', 'basePrice'],
          properties: {
            sellerId: { type: 'string', example: 'seller-1' },
            code: { type: 'string', example: 'LMP-001' },
            name: { type: 'string', example: 'Brass desk lamp' },
            description: { type: 'string', example: 'Working condition, original shade' },
            imageRef: { type: 'string', example: 'images/lmp-001.jpg' },
            basePrice: { type: 'number', example: 25.5, minimum: 0 },
          },
        },
        Auction: {
          type: 'object',
          properties: {
            id: { type: 'string', example: 'auct_1760000000000_def456' },
            initialPrice: { type: 'number', example: 25.5 },
            minimumBidIncrement: { type: 'number', example: 1 },
            deadline: { type: 'string', format: 'date-time' },
            createdAt: { type: 'string', format: 'date-time' },
            creatorId: { type: 'string', example: 'seller-1' },
            status: { type: 'string', enum: ['OPEN', 'CLOSED'], example: 'OPEN' },
            winnerId: { type: 'string', nullable: true },
            winningPrice: { type: 'number', nullable: true },
          },
        },
        CreateAuctionRequest: {
          type: 'object',
          required: ['creatorId', 'itemIds', 'minimumBidIncrement', 'deadline'],
          properties: {
            creatorId: { type: 'string', example: 'seller-1' },
            itemIds: { type: 'array', items: { type: 'string' } },
            minimumBidIncrement: { type: 'integer', example: 1, minimum: 1 },
            deadline: {
              type: 'string',
              format: 'date-time',
              description: 'Absolute instant, more than 3 minutes in the future',
            },
          },
        },
        Bid: {
          type: 'object',
          properties: {
            id: { type: 'string', example: 'bid_1760000000000_ghi789' },
            auctionId: { type: 'string' },
            bidderId: { type: 'string', example: 'buyer-1' },
            amount: { type: 'number', example: 26.5 },
            timestamp: { type: 'string', format: 'date-time' },
          },
        },
        PlaceBidRequest: {
          type: 'object',
          required: ['auctionId', 'bidderId', 'amount'],
          properties: {
            auctionId: { type: 'string' },
            bidderId: { type: 'string', example: 'buyer-1' },
            amount: { type: 'number', example: 26.5 },
          },
        },
        ErrorResponse: {
          type: 'object',
          properties: {
            success: { type: 'boolean', example: false },
            error: {
              type: 'object',
              properties: {
                code: { type: 'string', example: 'BID_TOO_LOW' },
                message: { type: 'string' },
                details: { type: 'object' },
              },
            },
          },
        },
      },
    },
    paths: {
      '/api/items': {
        post: {
          tags: ['Items'],
          summary: 'Register an item',
          requestBody: {
            required: true,
            content: { 'application/json': { schema: { $ref: '#/components/schemas/CreateItemRequest' } } },
          },
          responses: {
            201: dataResponse('Item created', { $ref: '#/components/schemas/Item' }),
            400: errorResponse('Invalid input'),
            409: errorResponse('Item code already exists'),
          },
        },
      },
      '/api/items/available': {
        get: {
          tags: ['Items'],
          summary: 'Items a seller can still auction',
          parameters: [{ name: 'sellerId', in: 'query', required: true, schema: { type: 'string' } }],
          responses: {
            200: dataResponse('Available items', { type: 'array', items: { $ref: '#/components/schemas/Item' } }),
          },
        },
      },
      '/api/auctions': {
        post: {
          tags: ['Auctions'],
          summary: 'Create an auction from available items',
          requestBody: {
            required: true,
            content: { 'application/json': { schema: { $ref: '#/components/schemas/CreateAuctionRequest' } } },
          },
          responses: {
            201: dataResponse('Auction created', { $ref: '#/components/schemas/Auction' }),
            400: errorResponse('Invalid input'),
            403: errorResponse('Item not owned by the creator'),
            404: errorResponse('Item not found'),
            409: errorResponse('Item already in another auction'),
          },
        },
        get: {
          tags: ['Auctions'],
          summary: 'Auctions created by a user',
          parameters: [
            { name: 'creatorId', in: 'query', required: true, schema: { type: 'string' } },
            { name: 'status', in: 'query', schema: { type: 'string', enum: ['OPEN', 'CLOSED'] } },
          ],
          responses: {
            200: dataResponse('Auctions', { type: 'array', items: { $ref: '#/components/schemas/Auction' } }),
          },
        },
      },
      '/api/auctions/won': {
        get: {
          tags: ['Auctions'],
          summary: 'Auctions won by a user',
          parameters: [{ name: 'userId', in: 'query', required: true, schema: { type: 'string' } }],
          responses: {
            200: dataResponse('Auctions', { type: 'array', items: { $ref: '#/components/schemas/Auction' } }),
          },
        },
      },
      '/api/auctions/{id}': {
        get: {
          tags: ['Auctions'],
          summary: 'Auction details with items, bids and minimum next bid',
          parameters: [idParam],
          responses: {
            200: { description: 'Auction details' },
            404: errorResponse('Auction not found'),
          },
        },
      },
      '/api/auctions/{id}/close': {
        post: {
          tags: ['Auctions'],
          summary: 'Close an auction after its deadline',
          parameters: [idParam],
          requestBody: {
            required: true,
            content: {
              'application/json': {
                schema: { type: 'object', required: ['requesterId'], properties: { requesterId: { type: 'string' } } },
              },
            },
          },
          responses: {
            200: dataResponse('Auction closed', { $ref: '#/components/schemas/Auction' }),
            403: errorResponse('Requester is not the creator'),
            404: errorResponse('Auction not found'),
            409: errorResponse('Already closed or deadline not reached'),
          },
        },
      },
      '/api/bids': {
        post: {
          tags: ['Bids'],
          summary: 'Place a bid',
          requestBody: {
            required: true,
            content: { 'application/json': { schema: { $ref: '#/components/schemas/PlaceBidRequest' } } },
          },
          responses: {
            201: dataResponse('Bid admitted', { $ref: '#/components/schemas/Bid' }),
            400: errorResponse('Bid too low or malformed'),
            403: errorResponse('Bidding on own auction'),
            404: errorResponse('Auction not found'),
            409: errorResponse('Auction not open or expired'),
          },
        },
      },
      '/api/admin/stats': {
        get: {
          tags: ['Admin'],
          summary: 'Store totals and lock occupancy',
          responses: { 200: { description: 'Statistics' } },
        },
      },
    },
  },
  apis: [], // We're using inline definition above
};

export const swaggerSpec = swaggerJsdoc(options);
