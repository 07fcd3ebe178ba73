import { createClient, printPairs, run } from './common';

const chainId = process.argv[2] || 'ethereum';
const pairAddress = process.argv[3] || '0x88e6a0c2ddd26feeb64f039a2c41296fcb3f5640';

run(async () => {
  const client = createClient();
  const response = await client.getPairsByChainAndAddress(chainId, pairAddress);
  printPairs(`Pair ${pairAddress} on ${chainId}`, response);

  const pair = response.pairs[0];
  if (pair?.liquidity) {
    console.log(`Pool: ${pair.liquidity.base} ${pair.baseToken.symbol} / ${pair.liquidity.quote} ${pair.quoteToken.symbol}`);
  }
});
