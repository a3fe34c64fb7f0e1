import mongoose from 'mongoose';
import { createApp } from './app';
import { loadConfig, loadEnvFile } from './config';
import { FinanceRepository } from './repository/financeRepository';
import { AdvisorService } from './services/advisorService';
import { AnalyticsService } from './services/analyticsService';
import { BudgetService } from './services/budgetService';
import { TransactionService } from './services/transactionService';
import { UserService } from './services/userService';
import { MongoDocumentStore } from './store/mongoStore';

async function main(): Promise<void> {
  loadEnvFile();
  const config = loadConfig();

  if (!config.mongoUri) {
    throw new Error('MONGO_URI is not set');
  }

  await mongoose.connect(config.mongoUri);
  console.log('✅ Connected to MongoDB');

  const store = MongoDocumentStore.forCollection(config.storeCollection);
  await store.ensureIndexes();

  const repo = new FinanceRepository(store, {
    listLimit: config.listLimit,
    maxBatchAttempts: config.batchMaxRetries,
    retryDelayMs: config.batchRetryDelayMs,
  });

  const app = createApp(
    {
      transactions: new TransactionService(repo),
      budgets: new BudgetService(repo, config.listLimit),
      analytics: new AnalyticsService(repo, { listLimit: config.listLimit }),
      users: new UserService(repo),
      advisor: new AdvisorService(repo, config.ai, { listLimit: config.listLimit }),
    },
    config.corsOrigins,
  );

  if (!config.ai.apiKey) {
    console.log('⚠️ AI_API_KEY is not set, advice endpoints return generic suggestions');
  }

  app.listen(config.port, () => {
    console.log(`🚀 Backend server running at http://localhost:${config.port}`);
    console.log(`📊 Transactions API at http://localhost:${config.port}/api/transactions`);
  });
}

main().catch((error: unknown) => {
  console.error('❌ Failed to start the server', error);
  process.exit(1);
});
