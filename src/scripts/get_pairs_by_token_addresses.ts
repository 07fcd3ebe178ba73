import { MAX_TOKEN_ADDRESSES } from '../config';
import { createClient, printPairs, run } from './common';

const chainId = process.argv[2] || 'ethereum';
const addresses = process.argv.length > 3
  ? process.argv.slice(3)
  : [
    '0xc02aaa39b223fe8d0a0e5c4f27ead9083c756cc2', // WETH
    '0xa0b86991c6218b36c1d19d4a2e9eb0ce3606eb48', // USDC
  ];

run(async () => {
  if (addresses.length > MAX_TOKEN_ADDRESSES) {
    console.warn(`Only the first ${MAX_TOKEN_ADDRESSES} addresses will be queried`);
  }

  const client = createClient();
  const response = await client.getPairsByTokenAddresses(chainId, addresses.slice(0, MAX_TOKEN_ADDRESSES));
  printPairs(`Pairs for ${addresses.length} token(s) on ${chainId}`, response);
});
