import { config } from '../src/config.js';
import { loadDataset } from '../src/data/dataset.js';
import { searchProperties } from '../src/services/search.js';
import { describeFilters, generateSummary } from '../src/services/summary.js';
import { renderPropertyCard } from '../src/services/property-card.js';
import { formatCardLines } from '../src/services/card-text.js';
import { parseSearchArgs } from '../src/utils/cli-args.js';

function runQuery() {
  const { q: query, limit } = parseSearchArgs(process.argv.slice(2), config.search.maxLimit);
  const dataset = loadDataset(config.data);
  console.log(`Loaded ${dataset.records.length} property records`);

  console.log(`\n🔍 Searching for: '${query}'\n`);
  const { records, filters } = searchProperties(dataset, query, limit);

  console.log('📋 Extracted Filters:');
  for (const line of describeFilters(filters)) {
    console.log(`   • ${line}`);
  }
  console.log('');

  console.log('📊 Summary:');
  console.log(`   ${generateSummary(records, filters)}\n`);

  if (records.length === 0) {
    console.log('No properties found.');
    return;
  }

  console.log('='.repeat(80));
  console.log('PROPERTY LISTINGS'.padStart(48).padEnd(80));
  console.log(`${'='.repeat(80)}\n`);

  records.forEach((record, idx) => {
    console.log(formatCardLines(renderPropertyCard(record), idx + 1).join('\n'));
    console.log('');
  });
}

try {
  runQuery();
} catch (err) {
  console.error(err instanceof Error ? err.message : err);
  process.exit(1);
}
