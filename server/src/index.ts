import 'dotenv/config';

import { AnalysisService } from './analyzer/runAnalysis.js';
import { loadLanguageTable } from './analyzer/language.js';
import { createApp } from './app.js';
import { loadConfig } from './config.js';
import { asErrorText } from './errors.js';
import { createOpenAiCompatibleClient } from './llm/openaiCompatible.js';
import { resolveLlmBaseUrls } from './llm/provider.js';
import { Logger, setLogLevel } from './logger.js';
import { WEB_DIST_DIR } from './paths.js';

function main(): void {
  const config = loadConfig();
  setLogLevel(config.log.level);

  if (!config.llm.apiKey) {
    Logger.warn('LLM_API_KEY (or GROQ_API_KEY) is not set; analysis requests will be rejected by the provider');
  }

  loadLanguageTable();

  const baseUrls = resolveLlmBaseUrls(config.llm.provider, config.llm.baseUrls);
  const analysis = new AnalysisService({
    llm: createOpenAiCompatibleClient({
      baseUrls,
      apiKey: config.llm.apiKey ?? '',
      timeoutMs: config.llm.timeoutMs,
    }),
    models: { visionModel: config.llm.visionModel, textModel: config.llm.textModel },
  });

  const app = createApp({ config, analysis, webDistDir: WEB_DIST_DIR });
  app.listen(config.server.port, () => {
    Logger.success(`API server listening on http://localhost:${config.server.port} (LLM base URLs ${baseUrls.join(', ')})`);
  });
}

try {
  main();
} catch (error) {
  Logger.fail(`Startup failed: ${asErrorText(error)}`);
  process.exitCode = 1;
}
