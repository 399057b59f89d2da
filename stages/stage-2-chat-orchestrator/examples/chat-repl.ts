/**
 * Stage 2 终端聊天：从 .env 组装 Gateway + Orchestrator，进入 REPL。
 * /policy 切换记忆策略（新策略对应新的 session key，历史从空开始），/help 查看全部命令。
 */

import {
  buildProviderConfig,
  getDefaultModel,
  getFallbackModels,
  getModelProviderMap,
  loadGlobalConfig,
} from "../../../config/index.js";
import {
  createConsoleLogger,
  createModelGateway,
} from "../../stage-0-model-gateway/src/index.js";
import {
  createChatOrchestrator,
  createSessionStore,
  runChatRepl,
} from "../src/index.js";

async function main() {
  const config = loadGlobalConfig();
  const logger = createConsoleLogger(config.logLevel);
  const defaultModel = getDefaultModel();

  const llm = createModelGateway({
    providers: buildProviderConfig(),
    defaultModel,
    modelProviderMap: getModelProviderMap(),
    fallbackModels: getFallbackModels().filter((m) => m !== defaultModel),
    timeoutMs: 30000,
    retry: { maxRetries: 2, backoffMs: 400, maxBackoffMs: 2000, jitter: 0.2 },
    logger,
  });

  const orchestrator = createChatOrchestrator({
    llm,
    store: createSessionStore({ logger }),
    logger,
    systemPrompt: config.memory.systemPrompt,
    summaryMaxTokens: 512,
  });

  await runChatRepl({
    orchestrator,
    policy: config.memory.policy,
    temperature: config.memory.temperature,
  });
}

main().catch((error) => {
  console.error(error);
  process.exitCode = 1;
});
