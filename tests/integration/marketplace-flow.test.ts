/**
 * Marketplace end-to-end tests
 *
 * Buyer and seller clients talk to the gateways over TCP; the gateways talk
 * to the real catalog service and an in-process account store.
 */

import net from 'net';
import { NIL } from 'uuid';
import {
  AccountServiceClient,
  BuyerRequest,
  BuyerResponse,
  LineServer,
  createServiceLogger,
} from '@marketline/shared';
import { buildServer as buildCatalogServer } from '../../backend/services/catalog-service/src/server';
import { buildServer as buildBuyerGateway } from '../../backend/services/buyer-gateway/src/server';
import { AccountStoreStub } from '../fixtures/account-store.stub';
import { LineClient } from '../fixtures/line-client';
import {
  BuyerSession,
  Marketplace,
  SellerSession,
  expectVariant,
  startMarketplace,
} from '../fixtures/marketplace';

const PASSWORD = 'test-password';
const SESSION_TTL_SECONDS = 60;

describe('Marketplace flow', () => {
  let now = 1_700_000_000;
  let marketplace: Marketplace;
  let sessions: Array<BuyerSession | SellerSession> = [];

  const openBuyer = async (): Promise<BuyerSession> => {
    const session = await BuyerSession.open(marketplace.buyerAddress);
    sessions.push(session);
    return session;
  };

  const openSeller = async (): Promise<SellerSession> => {
    const session = await SellerSession.open(marketplace.sellerAddress);
    sessions.push(session);
    return session;
  };

  const signUpSeller = async (seller: SellerSession, sellerName: string): Promise<string> => {
    expectVariant(await seller.send({ type: 'CreateAccount', sellerName, password: PASSWORD }), 'CreateAccount');
    const login = expectVariant(await seller.send({ type: 'Login', sellerName, password: PASSWORD }), 'Login');
    return login.sessionId;
  };

  const signUpBuyer = async (buyer: BuyerSession, buyerName: string): Promise<string> => {
    expectVariant(await buyer.send({ type: 'CreateAccount', buyerName, password: PASSWORD }), 'CreateAccount');
    const login = expectVariant(await buyer.send({ type: 'Login', buyerName, password: PASSWORD }), 'Login');
    return login.sessionId;
  };

  const registerWidget = async (seller: SellerSession, sessionId: string, quantity = 5): Promise<string> => {
    const response = await seller.send({
      type: 'RegisterItemForSale',
      sessionId,
      itemName: 'Widget',
      itemCategory: 3,
      keywords: ['red', 'small'],
      condition: 'New',
      salePrice: 9.99,
      quantity,
    });
    return expectVariant(response, 'RegisterItemForSale').itemId;
  };

  beforeAll(async () => {
    marketplace = await startMarketplace({ clock: () => now, sessionTtlSeconds: SESSION_TTL_SECONDS });
  });

  afterEach(() => {
    sessions.forEach((session) => session.close());
    sessions = [];
  });

  afterAll(async () => {
    await marketplace.stop();
  });

  it('should let a buyer find an item a seller registered', async () => {
    const seller = await openSeller();
    const sellerSessionId = await signUpSeller(seller, 'alice');
    const itemId = await registerWidget(seller, sellerSessionId);

    expect(itemId).not.toBe(NIL);

    const buyer = await openBuyer();
    const buyerSessionId = await signUpBuyer(buyer, 'bob');
    const search = await buyer.send({ type: 'SearchItemsForSale', sessionId: buyerSessionId, category: 3, keywords: ['red'] });

    expect(search).toEqual({
      type: 'SearchItemsForSale',
      items: [{
        itemId,
        sellerId: expect.any(String),
        itemName: 'Widget',
        itemCategory: 3,
        keywords: ['red', 'small'],
        condition: 'New',
        salePrice: 9.99,
        quantity: 5,
        feedback: { thumbsUp: 0, thumbsDown: 0 },
      }],
    });
  });

  it('should not reserve listed quantity across cart adds', async () => {
    const seller = await openSeller();
    const itemId = await registerWidget(seller, await signUpSeller(seller, 'carol'), 5);

    const buyer = await openBuyer();
    const sessionId = await signUpBuyer(buyer, 'dave');

    await expect(buyer.send({ type: 'AddItemToCart', sessionId, itemId, quantity: 3 }))
      .resolves.toEqual({ type: 'AddItemToCart' });
    await expect(buyer.send({ type: 'AddItemToCart', sessionId, itemId, quantity: 3 }))
      .resolves.toEqual({ type: 'AddItemToCart' });
    await expect(buyer.send({ type: 'DisplayCart', sessionId }))
      .resolves.toEqual({ type: 'DisplayCart', cart: [{ itemId, quantity: 6 }] });

    await expect(buyer.send({ type: 'AddItemToCart', sessionId, itemId, quantity: 6 }))
      .resolves.toEqual({ type: 'Error', message: 'Insufficient quantity' });
  });

  it('should expire a session lazily and delete it on first use', async () => {
    const buyer = await openBuyer();
    const sessionId = await signUpBuyer(buyer, 'erin');

    now += SESSION_TTL_SECONDS + 1;

    await expect(buyer.send({ type: 'DisplayCart', sessionId }))
      .resolves.toEqual({ type: 'Error', message: 'Session expired' });

    const accounts = new AccountServiceClient(marketplace.accountAddress, createServiceLogger('marketplace-test'));
    await expect(accounts.getSession(sessionId)).resolves.toBeNull();
    await expect(buyer.send({ type: 'DisplayCart', sessionId }))
      .resolves.toEqual({ type: 'Error', message: 'Session not found' });
  });

  it('should stop one seller from repricing another seller\'s item', async () => {
    const owner = await openSeller();
    const itemId = await registerWidget(owner, await signUpSeller(owner, 'frank'));

    const rival = await openSeller();
    const rivalSessionId = await signUpSeller(rival, 'grace');

    await expect(rival.send({ type: 'ChangeItemPrice', sessionId: rivalSessionId, itemId, newPrice: 0.01 }))
      .resolves.toEqual({ type: 'Error', message: 'Not your item' });

    const buyer = await openBuyer();
    const buyerSessionId = await signUpBuyer(buyer, 'heidi');
    const lookup = expectVariant(await buyer.send({ type: 'GetItem', sessionId: buyerSessionId, itemId }), 'GetItem');

    expect(lookup.item?.salePrice).toBe(9.99);
  });

  it('should let a seller manage their own listings', async () => {
    const seller = await openSeller();
    const sessionId = await signUpSeller(seller, 'ivan');
    const itemId = await registerWidget(seller, sessionId);

    await expect(seller.send({ type: 'ChangeItemPrice', sessionId, itemId, newPrice: 7.5 }))
      .resolves.toEqual({ type: 'ChangeItemPrice' });
    await expect(seller.send({ type: 'UpdateUnitsForSale', sessionId, itemId, quantity: 2 }))
      .resolves.toEqual({ type: 'UpdateUnitsForSale' });

    const listing = expectVariant(await seller.send({ type: 'DisplayItemsForSale', sessionId }), 'DisplayItemsForSale');
    expect(listing.items).toHaveLength(1);
    expect(listing.items[0]).toMatchObject({ itemId, salePrice: 7.5, quantity: 2 });

    await expect(seller.send({ type: 'GetSellerRating', sessionId }))
      .resolves.toEqual({ type: 'GetSellerRating', feedback: { thumbsUp: 0, thumbsDown: 0 } });
  });

  it('should record item feedback and keep purchase history empty', async () => {
    const seller = await openSeller();
    const itemId = await registerWidget(seller, await signUpSeller(seller, 'judy'));

    const buyer = await openBuyer();
    const sessionId = await signUpBuyer(buyer, 'ken');

    await expect(buyer.send({ type: 'ProvideFeedback', sessionId, itemId, thumbsUp: true }))
      .resolves.toEqual({ type: 'ProvideFeedback' });
    await expect(buyer.send({ type: 'ProvideFeedback', sessionId, itemId, thumbsUp: false }))
      .resolves.toEqual({ type: 'ProvideFeedback' });

    const lookup = expectVariant(await buyer.send({ type: 'GetItem', sessionId, itemId }), 'GetItem');
    expect(lookup.item?.feedback).toEqual({ thumbsUp: 1, thumbsDown: 1 });

    await expect(buyer.send({ type: 'GetBuyerPurchases', sessionId }))
      .resolves.toEqual({ type: 'GetBuyerPurchases', itemIds: [] });
  });

  it('should keep at least one of two concurrent feedback increments', async () => {
    const seller = await openSeller();
    const itemId = await registerWidget(seller, await signUpSeller(seller, 'leo'));

    const first = await openBuyer();
    const second = await openBuyer();
    const sessionId = await signUpBuyer(first, 'mallory');

    await Promise.all([
      first.send({ type: 'ProvideFeedback', sessionId, itemId, thumbsUp: true }),
      second.send({ type: 'ProvideFeedback', sessionId, itemId, thumbsUp: true }),
    ]);

    const lookup = expectVariant(await first.send({ type: 'GetItem', sessionId, itemId }), 'GetItem');
    expect([1, 2]).toContain(lookup.item?.feedback.thumbsUp);
  });

  it('should save, clear and display the cart', async () => {
    const seller = await openSeller();
    const itemId = await registerWidget(seller, await signUpSeller(seller, 'nina'));

    const buyer = await openBuyer();
    const sessionId = await signUpBuyer(buyer, 'oscar');

    await buyer.send({ type: 'AddItemToCart', sessionId, itemId, quantity: 2 });
    await expect(buyer.send({ type: 'SaveCart', sessionId })).resolves.toEqual({ type: 'SaveCart' });
    await expect(buyer.send({ type: 'RemoveItemFromCart', sessionId, itemId, quantity: 1 }))
      .resolves.toEqual({ type: 'RemoveItemFromCart' });
    await expect(buyer.send({ type: 'DisplayCart', sessionId }))
      .resolves.toEqual({ type: 'DisplayCart', cart: [{ itemId, quantity: 1 }] });
    await expect(buyer.send({ type: 'ClearCart', sessionId })).resolves.toEqual({ type: 'ClearCart' });
    await expect(buyer.send({ type: 'DisplayCart', sessionId }))
      .resolves.toEqual({ type: 'DisplayCart', cart: [] });
  });

  it('should reject a buyer session at the seller gateway', async () => {
    const buyer = await openBuyer();
    const sessionId = await signUpBuyer(buyer, 'peggy');

    const seller = await openSeller();
    await expect(seller.send({ type: 'DisplayItemsForSale', sessionId }))
      .resolves.toEqual({ type: 'Error', message: 'Invalid session type' });
  });

  it('should end a session on logout', async () => {
    const buyer = await openBuyer();
    const sessionId = await signUpBuyer(buyer, 'quentin');

    await expect(buyer.send({ type: 'Logout', sessionId })).resolves.toEqual({ type: 'Logout' });
    await expect(buyer.send({ type: 'DisplayCart', sessionId }))
      .resolves.toEqual({ type: 'Error', message: 'Session not found' });
  });

  it('should refuse a wrong password and pass account store errors through', async () => {
    const buyer = await openBuyer();
    await signUpBuyer(buyer, 'rupert');

    await expect(buyer.send({ type: 'Login', buyerName: 'rupert', password: 'wrong' }))
      .resolves.toEqual({ type: 'Error', message: 'Invalid password' });
    await expect(buyer.send({ type: 'CreateAccount', buyerName: 'rupert', password: PASSWORD }))
      .resolves.toEqual({ type: 'Error', message: 'Buyer name already exists' });
  });

  it('should answer malformed frames without dropping the connection', async () => {
    const client = await LineClient.connect(marketplace.buyerAddress);

    try {
      client.writeLine('{not json');
      const malformed = await client.nextFrame();
      const badField = await client.request({ type: 'ProvideFeedback', sessionId: 's', itemId: 'i', thumbsUp: 'yes' });
      const unknown = await client.request({ type: 'Login', sellerName: 'x', password: PASSWORD });

      expect(malformed).toEqual({ type: 'Error', message: expect.stringMatching(/^Invalid request: /) });
      expect(badField).toEqual({ type: 'Error', message: 'Invalid request: "thumbsUp" must be a boolean' });
      expect(unknown).toEqual({ type: 'Error', message: 'Invalid request: "buyerName" is required' });
    } finally {
      client.close();
    }
  });

  it('should answer a client that half-closes right after its request', async () => {
    const { host, port } = marketplace.buyerAddress;
    const received = await new Promise<string>((resolve, reject) => {
      const socket = net.createConnection({ host, port }, () => {
        socket.end('{"type":"Login","buyerName":"nobody","password":"x"}\n');
      });
      let data = '';
      socket.setEncoding('utf8');
      socket.on('data', (chunk: string) => {
        data += chunk;
      });
      socket.once('end', () => resolve(data));
      socket.once('error', reject);
    });

    expect(received).toBe('{"type":"Error","message":"Buyer not found"}\n');
  });
});

describe('Buyer gateway with downstream services missing', () => {
  const logger = createServiceLogger('marketplace-test');
  let accounts: AccountStoreStub;
  let gateway: LineServer<BuyerRequest, BuyerResponse>;
  let buyer: BuyerSession;

  beforeAll(async () => {
    accounts = new AccountStoreStub();
    const accountServiceAddress = await accounts.start();

    // Bind and release a port so nothing is listening on it
    const placeholder = buildCatalogServer({ logger });
    const catalogServiceAddress = await placeholder.listen({ host: '127.0.0.1', port: 0 });
    await placeholder.close();

    gateway = buildBuyerGateway({ accountServiceAddress, catalogServiceAddress, logger });
    buyer = await BuyerSession.open(await gateway.listen({ host: '127.0.0.1', port: 0 }));
  });

  afterAll(async () => {
    buyer.close();
    await gateway.close();
  });

  it('should fall back to operation messages when a store is unreachable', async () => {
    expectVariant(await buyer.send({ type: 'CreateAccount', buyerName: 'sybil', password: PASSWORD }), 'CreateAccount');
    const { sessionId } = expectVariant(
      await buyer.send({ type: 'Login', buyerName: 'sybil', password: PASSWORD }),
      'Login'
    );

    await expect(buyer.send({ type: 'SearchItemsForSale', sessionId, category: null, keywords: [] }))
      .resolves.toEqual({ type: 'Error', message: 'Search failed' });
    await expect(buyer.send({ type: 'DisplayCart', sessionId }))
      .resolves.toEqual({ type: 'Error', message: 'Failed to get cart' });

    await accounts.stop();

    await expect(buyer.send({ type: 'DisplayCart', sessionId }))
      .resolves.toEqual({ type: 'Error', message: 'Failed to validate session' });
    await expect(buyer.send({ type: 'CreateAccount', buyerName: 'trent', password: PASSWORD }))
      .resolves.toEqual({ type: 'Error', message: 'Failed to create buyer account' });
  });
});
