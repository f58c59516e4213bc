import { createServer } from 'http';
import { createApp } from './app';
import { loadConfig, loadDotenv } from './config/env';
import { createSupabase, SupabaseHistoryRepository } from './config/supabase';
import { HistoryTools } from './tools/historyTools';
import { HistoryStore } from './utils/historyStore';
import { logger, setLogLevel } from './utils/logger';

// Загружаем переменные окружения
loadDotenv();

const config = loadConfig();
setLogLevel(config.logLevel);

const supabase = createSupabase(config);
const repository = new SupabaseHistoryRepository(supabase, config.channel);
const tools = new HistoryTools(new HistoryStore(repository));

const app = createApp(tools, { corsOrigin: config.corsOrigin });
const httpServer = createServer(app);

httpServer.listen(config.port, () => {
    logger.info(`History tool server is running on port ${config.port} (channel: ${config.channel})`);
});

httpServer.on('error', (error) => {
    logger.error('Error starting server:', error);
    process.exitCode = 1;
});
