import { config as defaultConfig } from "./config";
import type { ServiceConfig } from "./config";
import { createDecisionRunStore } from "./decision/run-store";
import type { DecisionRunStore } from "./decision/run-store";
import { DecisionWorkflow } from "./decision/workflow";
import { DecisionExtractor } from "./extractor/decision-extractor";
import { OpenAiChatClient } from "./llm/chat-client";
import type { ChatClient } from "./llm/chat-client";
import { logger } from "./logger";
import type { Classifier } from "./prediction/classifier";
import { KeywordClassifier } from "./prediction/keyword-classifier";
import { LlmClassifier } from "./prediction/llm-classifier";

export type DecisionServices = {
  store: DecisionRunStore;
  chat: ChatClient | null;
  classifier: Classifier | null;
  workflow: DecisionWorkflow;
  extractor: DecisionExtractor | null;
};

export type DecisionServiceOverrides = {
  store?: DecisionRunStore;
  chat?: ChatClient | null;
  classifier?: Classifier | null;
  now?: () => Date;
  newThreadId?: (startedAt: Date) => string;
};

export function createClassifier(settings: ServiceConfig, chat: ChatClient | null): Classifier | null {
  switch (settings.classifierProvider) {
    case "none":
      return null;
    case "keyword":
      return new KeywordClassifier();
    case "llm":
      if (!chat) {
        logger.warn("CLASSIFIER_PROVIDER=llm but no chat model is configured; predictions are disabled");
        return null;
      }
      return new LlmClassifier(chat);
  }
}

/**
 * Builds every long-lived collaborator once. Routes and the workflow receive
 * these handles instead of reaching for module state.
 */
export function createDecisionServices(
  overrides: DecisionServiceOverrides = {},
  settings: ServiceConfig = defaultConfig
): DecisionServices {
  const chat = overrides.chat !== undefined ? overrides.chat : settings.llm.apiKey ? new OpenAiChatClient(settings.llm) : null;
  const classifier = overrides.classifier !== undefined ? overrides.classifier : createClassifier(settings, chat);
  const store = overrides.store ?? createDecisionRunStore(settings);
  const workflow = new DecisionWorkflow({
    store,
    classifier,
    now: overrides.now,
    newThreadId: overrides.newThreadId
  });
  return {
    store,
    chat,
    classifier,
    workflow,
    extractor: chat ? new DecisionExtractor(chat) : null
  };
}
