/**
 * Stage 1 Chat Memory 基础用法：
 * 同一段对话分别交给四种记忆策略，对比每种策略 read() 出来的上下文。
 * 默认用离线 mock 模型生成摘要；传 --live 则走 .env 配置的 Gateway。
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
  createMockLanguageModel,
  createModelGateway,
  type LanguageModel,
} from "../../stage-0-model-gateway/src/index.js";
import {
  assistantMessage,
  createHistoryPolicy,
  createUsageAccumulator,
  describePolicy,
  userMessage,
  type PolicySpec,
} from "../src/index.js";

const CONVERSATION = [
  userMessage("Hi, I'm planning a trip to Lisbon in May."),
  assistantMessage("Lovely! May is warm and not too crowded."),
  userMessage("I like seafood and old trams."),
  assistantMessage("Try the Alfama district and tram 28."),
  userMessage("What was the city I mentioned?"),
  assistantMessage("You mentioned Lisbon."),
];

const POLICIES: PolicySpec[] = [
  { kind: "unbounded" },
  { kind: "sliding_window", windowSize: 2 },
  { kind: "recursive_summary" },
  { kind: "summary_window", windowSize: 2 },
];

function createLanguageModel(live: boolean): LanguageModel {
  if (!live) {
    let n = 0;
    return createMockLanguageModel([], {
      fallback: (request) => {
        n += 1;
        const lines = request.messages[1]?.content.split("\n").length ?? 0;
        return { text: `[mock summary #${n}, folded ${lines} prompt lines]` };
      },
    });
  }
  const config = loadGlobalConfig();
  const defaultModel = getDefaultModel();
  return createModelGateway({
    providers: buildProviderConfig(),
    defaultModel,
    modelProviderMap: getModelProviderMap(),
    fallbackModels: getFallbackModels().filter((m) => m !== defaultModel),
    timeoutMs: 20000,
    logger: createConsoleLogger(config.logLevel),
  });
}

async function main() {
  const live = process.argv.includes("--live");
  const llm = createLanguageModel(live);

  console.log("\n========== Stage 1 知识点 ==========");
  console.log("1. HistoryPolicy：append / read / clear，四种策略同一接口。");
  console.log("2. 摘要策略在 append 时调用 LLM，失败则状态不变。");
  console.log("3. UsageAccumulator 显式传入，统计摘要调用的 token。");
  console.log("====================================\n");

  for (const spec of POLICIES) {
    const policy = createHistoryPolicy(spec, { llm, maxTokens: 256 });
    const usage = createUsageAccumulator();

    // 按轮追加：一轮 = user + assistant
    for (let i = 0; i < CONVERSATION.length; i += 2) {
      await policy.append(CONVERSATION.slice(i, i + 2), { usage });
    }

    const snapshot = usage.snapshot();
    console.log(`---------- ${describePolicy(spec)} ----------`);
    for (const message of policy.read()) {
      console.log(`[${message.role}] ${message.content}`);
    }
    console.log(
      `summary calls=${snapshot.calls + snapshot.unreportedCalls} tokens=${snapshot.totalTokens}\n`
    );
  }
}

main().catch((error) => {
  console.error(error);
  process.exitCode = 1;
});
