/**
 * Stage 0 Model Gateway 基础用法：
 * 从全局配置组装 Gateway，发一次 generate 请求，展示返回的 text / usage。
 * 输出：知识点、执行逻辑、本步调用顺序（输入 / AI 回复 / 代码处理）。
 */

import {
  buildProviderConfig,
  getDefaultModel,
  getFallbackModels,
  getModelProviderMap,
  loadGlobalConfig,
} from "../../../config/index.js";
import { createConsoleLogger, createModelGateway } from "../src/index.js";

function printKnowledgePoints() {
  console.log("\n========== Stage 0 知识点 ==========");
  console.log(
    "1. 模型网关：统一封装 Gemini / DeepSeek，按 model 选 provider，支持超时、重试、降级。"
  );
  console.log(
    "2. 请求/响应：generate({ messages, temperature }) 返回 text 与服务端上报的 usage（没有就是 undefined）。"
  );
  console.log(
    "3. 日志：Logger 以 JSON 行记录 request/response/error，级别由 LOG_LEVEL 控制。"
  );
  console.log("====================================\n");
}

function printExecutionLogic() {
  console.log("---------- 执行逻辑 ----------");
  console.log(
    "1. 从 .env 组装 providers、defaultModel、modelProviderMap、fallbackModels。"
  );
  console.log("2. createModelGateway(...)，可选 logger、retry、timeoutMs。");
  console.log(
    "3. gateway.generate(...) → 选模型、发请求、重试、记日志、返回 Generation。"
  );
  console.log("------------------------------------\n");
}

function snippet(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max)}...` : text;
}

async function main() {
  printKnowledgePoints();
  printExecutionLogic();

  const config = loadGlobalConfig();
  const defaultModel = getDefaultModel();
  const gateway = createModelGateway({
    providers: buildProviderConfig(),
    defaultModel,
    modelProviderMap: getModelProviderMap(),
    fallbackModels: getFallbackModels().filter((m) => m !== defaultModel),
    timeoutMs: 20000,
    retry: { maxRetries: 2, backoffMs: 400, maxBackoffMs: 2000, jitter: 0.2 },
    logger: createConsoleLogger(config.logLevel),
  });

  const messages = [
    { role: "system" as const, content: config.memory.systemPrompt },
    { role: "user" as const, content: "Explain a sliding window memory in one sentence." },
  ];
  const result = await gateway.generate({
    messages,
    temperature: config.memory.temperature,
  });

  console.log("========== 结果 ==========");
  console.log("Assistant:", snippet(result.text, 300));
  if (result.usage) console.log("Usage:", result.usage);

  console.log(
    "\n========== 本步调用顺序（输入 / AI 回复 / 代码处理）=========="
  );
  console.log(
    "输入:",
    `消息条数=${messages.length}`,
    `temperature=${config.memory.temperature}`,
    `最后一条内容摘要: ${snippet(messages[messages.length - 1]?.content ?? "", 100)}`
  );
  console.log(
    "AI 回复:",
    `model=${result.model ?? "-"}`,
    `provider=${result.provider ?? "-"}`,
    `usage: prompt=${result.usage?.promptTokens ?? "-"} completion=${
      result.usage?.completionTokens ?? "-"
    }`,
    `finishReason=${result.finishReason ?? "-"}`
  );
  console.log("代码处理: Gateway 将响应直接返回给调用方（不保存历史）。");
  console.log(
    "\n============================================================\n"
  );
}

main().catch((error) => {
  console.error(error);
  process.exitCode = 1;
});
