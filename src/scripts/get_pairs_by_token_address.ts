import { createClient, printPairs, run } from './common';

const chainId = process.argv[2] || 'ethereum';
// WETH
const tokenAddress = process.argv[3] || '0xc02aaa39b223fe8d0a0e5c4f27ead9083c756cc2';

run(async () => {
  const client = createClient();
  const response = await client.getPairsByTokenAddress(chainId, tokenAddress);
  printPairs(`Pools containing ${tokenAddress}`, response);
});
