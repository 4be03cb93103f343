import {
  OekoboxApiError,
  OekoboxAuthenticationError,
  OekoboxClient,
  OekoboxConnectionError,
  OekoboxValidationError,
} from '@oekobox-online/client';

const shopId = process.env.OEKOBOX_SHOP ?? 'demo';
const username = process.env.OEKOBOX_USER ?? '';
const password = process.env.OEKOBOX_PASSWORD ?? '';

async function main(): Promise<void> {
  const shops = await OekoboxClient.getAvailableShops();
  console.log(`${shops.length} shops listed, e.g. ${shops.slice(0, 3).map(s => s.name).join(', ')}`);

  const client = new OekoboxClient({ shopId, username, password, timeout: 15 });

  const groups = await client.getGroups();
  for (const group of groups) {
    console.log(`${group.name} (${group.count} items)`);
  }

  const matches = await client.searchItems('karotten');
  if (matches.length === 0) {
    console.log('Nothing found for "karotten"');
    return;
  }

  const order = await client.withSession(async c => {
    const [nextDate] = await c.getDeliveryDates();
    console.log(`Next delivery: ${nextDate?.date ?? 'none scheduled'}`);

    await c.addToCart(matches[0].id, 2);
    return c.createOrder();
  });

  console.log(`Order ${order.id} for ${order.deliveryDate}: ${order.positions.length} positions, total ${order.totalAmount}`);
}

main().catch((err: unknown) => {
  if (err instanceof OekoboxAuthenticationError) {
    console.error(`Login rejected: ${err.message}`);
  } else if (err instanceof OekoboxConnectionError) {
    console.error(`Shop unreachable: ${err.message}`);
  } else if (err instanceof OekoboxValidationError) {
    console.error(`Rejected: ${err.message}`);
  } else if (err instanceof OekoboxApiError) {
    console.error(`Shop error ${err.statusCode}: ${err.message}`, err.responseData);
  } else {
    console.error(err);
  }
  process.exitCode = 1;
});
