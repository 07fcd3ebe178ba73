import { createClient, printPairs, run } from './common';

const query = process.argv.slice(2).join(' ') || 'WETH USDC';

run(async () => {
  const client = createClient();
  const response = await client.searchPairs(query);
  printPairs(`Search "${query}"`, response, 20);
});
