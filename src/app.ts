import { Telegraf } from 'telegraf';
import { TelegrafChatPlatform } from './bot/chat/telegrafChatPlatform.js';
import { ConversationController } from './bot/controllers/conversationController.js';
import type { ConversationState, WizardRegistry } from './bot/controllers/conversationState.js';
import { createCrewWizard } from './bot/sections/crewWizard.js';
import { createExpensesWizard } from './bot/sections/expensesWizard.js';
import { createMaterialsWizard } from './bot/sections/materialsWizard.js';
import { createRegistrationWizard } from './bot/sections/registrationWizard.js';
import { registerBotHandlers } from './bot/telegramBot.js';
import { WizardEngine } from './bot/wizard/wizardEngine.js';
import { loadBotConfig } from './config/env.js';
import { createGoogleClient } from './config/googleClient.js';
import { errorMessage } from './errors/userMessages.js';
import { startDefaultMetrics } from './metrics/metrics.js';
import { createServer, type ServerOptions } from './server.js';
import { DashboardService } from './services/dashboardService.js';
import { createDriveClient, GoogleDriveFileStore } from './services/googleDriveFileStore.js';
import { ShiftNotifier } from './services/notificationService.js';
import { InMemorySessionStore } from './services/sessionStore.js';
import { createSheetsGateway } from './services/sheetsGateway.js';
import { SheetsRecordStore } from './services/sheetsRecordStore.js';
import { ShiftCloseService } from './services/shiftCloseService.js';
import { ShiftMenuService } from './services/shiftMenuService.js';
import { ShiftSessionService, type ShiftSession } from './services/shiftSessionService.js';
import { UserLockService } from './services/userLockService.js';
import logger from './utils/logger.js';

async function bootstrap(): Promise<void> {
  const config = loadBotConfig();
  startDefaultMetrics();

  const auth = createGoogleClient(config.google);
  const records = new SheetsRecordStore({
    gateway: createSheetsGateway(config.spreadsheetId, auth),
    shiftsSheet: config.shiftsSheet,
    directorySheet: config.directorySheet,
    timezone: config.shiftTimezone,
  });
  const files = new GoogleDriveFileStore({ drive: createDriveClient(auth), parentId: config.google.driveParentId });

  const bot = new Telegraf(config.telegramToken);
  const chat = new TelegrafChatPlatform(bot.telegram);

  const sessions = new ShiftSessionService(new InMemorySessionStore<ShiftSession>());
  const notifier = new ShiftNotifier({
    chat,
    groupChatId: config.groupChatId,
    enabled: config.groupNotifications,
  });
  const wizards: WizardRegistry = {
    crew: createCrewWizard(records),
    expenses: createExpensesWizard(records),
    materials: createMaterialsWizard({ records, files, chat, timezone: config.shiftTimezone }),
    registration: createRegistrationWizard(records),
  };

  const controller = new ConversationController({
    chat,
    states: new InMemorySessionStore<ConversationState>(),
    sessions,
    engine: new WizardEngine(chat),
    wizards,
    menu: new ShiftMenuService({ records, sessions, locks: new UserLockService(), chat }),
    close: new ShiftCloseService({ records, sessions, notifier, chat }),
    dashboard: new DashboardService(records, chat, sessions),
  });
  registerBotHandlers(bot, controller);

  const serverOptions: ServerOptions = {};
  if (config.webhook) {
    const handler = await bot.createWebhook({ domain: config.webhook.url, path: config.webhook.path });
    serverOptions.webhook = { path: config.webhook.path, handler };
    logger.info(`[bot] Webhook registered at ${config.webhook.url}${config.webhook.path}`);
  } else {
    bot
      .launch(() => logger.info('[bot] Long polling started'))
      .catch((error: unknown) => {
        logger.error(`[bot] Polling stopped: ${errorMessage(error)}`);
        process.exitCode = 1;
      });
  }

  const app = createServer(serverOptions);
  if (config.environment === 'production') {
    app.set('trust proxy', 1);
  }
  const server = app.listen(config.port, () => {
    logger.info(`bot server listening on port ${config.port} (${config.environment})`);
  });

  const shutdown = (signal: string) => {
    logger.info(`[bot] ${signal} received, stopping`);
    if (!config.webhook) {
      bot.stop(signal);
    }
    server.close();
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
}

bootstrap().catch((error: unknown) => {
  logger.error(`Failed to start the bot: ${errorMessage(error)}`);
  process.exitCode = 1;
});
