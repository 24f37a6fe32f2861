import { PlannerService } from '../../src/planner/service.js';
import { createApp } from './app.js';
import { loadConfig, type Config } from './config.js';
import { openDatabase, SqlitePlannerStore } from './db.js';
import { loadTipCorpus } from './tips.js';

function startupOrExit<T>(label: string, step: () => T): T {
  try {
    return step();
  } catch (error) {
    console.error(`Error ${label}:`, error);
    process.exit(1);
  }
}

const config: Config = startupOrExit('loading configuration', () => loadConfig());
const store = startupOrExit('opening database', () => new SqlitePlannerStore(openDatabase(config.dbPath)));
const tips = startupOrExit('loading tip corpus', () => loadTipCorpus(config.tipsPath));
const seeded = startupOrExit('seeding tips', () => store.seedTips(tips));
if (seeded > 0) {
  console.log(`Seeded ${seeded} tips from ${config.tipsPath}`);
}

const service = new PlannerService({ store, overageEpsilon: config.overageEpsilon });
const app = createApp(service);

app.listen(config.port, () => {
  console.log(`API server running on http://localhost:${config.port}`);
});
