/**
 * Content model construction from run configuration
 */

import { ModelRouter } from '../routing/index.js';
import { type ContentModel, type ModelRoute, type RosterSynthConfig, ValidationError } from '../types.js';
import { GeminiContentModel } from './gemini.js';
import { OpenRouterContentModel } from './openrouter.js';

export interface ResolvedModel {
  model: ContentModel;
  route: ModelRoute;
}

export function createContentModel(config: RosterSynthConfig, router?: ModelRouter): ResolvedModel {
  const modelRouter = router ?? new ModelRouter({
    defaultProvider: config.provider,
    providerKeys: { [config.provider]: config.apiKey }
  });

  const route = modelRouter.selectModel({
    provider: config.provider,
    preferredModel: config.model,
    capabilities: ['json']
  });
  const { apiKey } = modelRouter.getModelConfig(route);

  if (!apiKey) {
    const variable = route.provider === 'openrouter' ? 'OPENROUTER_API_KEY' : 'GEMINI_API_KEY';
    throw new ValidationError(`No API key for ${route.provider}. Set ${variable} or pass apiKey.`, {
      provider: route.provider
    });
  }

  const model = route.provider === 'gemini'
    ? new GeminiContentModel({ apiKey, model: route.model, timeout: config.timeout })
    : new OpenRouterContentModel({ apiKey, model: route.model, timeout: config.timeout });

  return { model, route };
}

export { GeminiContentModel } from './gemini.js';
export { OpenRouterContentModel } from './openrouter.js';
