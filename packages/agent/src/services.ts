import { MAX_SLOTS, SchedulingService } from "@slot-advisor/domain";
import { createLogger, loadConfig, type AppConfig } from "@slot-advisor/shared";
import { AgentRuntime } from "./runtime";

export function createSchedulingService(config: AppConfig = loadConfig()): SchedulingService {
  const agent = new AgentRuntime({
    model: config.OPENAI_MODEL,
    logger: createLogger("agent-runtime", config.LOG_LEVEL),
    ...(config.OPENAI_API_KEY ? { apiKey: config.OPENAI_API_KEY } : {}),
    ...(config.OPENAI_BASE_URL ? { baseUrl: config.OPENAI_BASE_URL } : {})
  });

  return new SchedulingService({
    engineConfig: {
      slotLengthMinutes: config.DEFAULT_SLOT_LENGTH_MINUTES,
      bufferMinutes: config.DEFAULT_BUFFER_MINUTES,
      maxSlots: MAX_SLOTS
    },
    parser: agent,
    explainer: agent,
    explanationTimeoutMs: config.EXPLANATION_TIMEOUT_MS,
    logger: createLogger("scheduling-service", config.LOG_LEVEL)
  });
}
