/** Wire payloads shared by the tests. */

export function jsonResponse(body: unknown, status = 200, headers?: Record<string, string>) {
  return new Response(JSON.stringify(body), { status, headers });
}

export function cardJson(overrides: Record<string, unknown> = {}) {
  return {
    id: 'card_1',
    object: 'card',
    brand: 'Visa',
    last4: '4242',
    exp_month: 12,
    exp_year: 2030,
    funding: 'credit',
    ...overrides,
  };
}

export function customerJson(overrides: Record<string, unknown> = {}) {
  return {
    id: 'cus_1',
    object: 'customer',
    created: 1700000000,
    livemode: false,
    email: 'a@example.com',
    default_source: 'card_1',
    metadata: {},
    ...overrides,
  };
}

export function chargeJson(overrides: Record<string, unknown> = {}) {
  return {
    id: 'ch_1',
    object: 'charge',
    amount: 2000,
    amount_refunded: 0,
    currency: 'usd',
    created: 1700000000,
    livemode: false,
    paid: true,
    captured: true,
    refunded: false,
    status: 'succeeded',
    customer: 'cus_1',
    source: cardJson(),
    metadata: {},
    ...overrides,
  };
}

export function transferJson(overrides: Record<string, unknown> = {}) {
  return {
    id: 'tr_1',
    object: 'transfer',
    amount: 500,
    amount_reversed: 0,
    currency: 'usd',
    created: 1700000000,
    livemode: false,
    reversed: false,
    destination: 'acct_1',
    ...overrides,
  };
}

export function eventJson(object: unknown = chargeJson()) {
  return {
    id: 'evt_1',
    object: 'event',
    type: 'charge.succeeded',
    created: 1700000000,
    livemode: false,
    data: { object },
  };
}

export function listJson(url: string, data: unknown[], hasMore = false) {
  return { object: 'list', url, has_more: hasMore, data };
}
