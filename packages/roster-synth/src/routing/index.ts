/**
 * Model routing logic for Gemini and OpenRouter
 */

import { type ModelProvider, type ModelRoute, SynthError } from '../types.js';

export interface RouterConfig {
  defaultProvider: ModelProvider;
  providerKeys: {
    gemini?: string;
    openrouter?: string;
  };
  customRoutes?: ModelRoute[];
}

const DEFAULT_CUSTOM_OUTPUT_TOKENS = 8192;

/**
 * Model router for provider selection
 */
export class ModelRouter {
  private config: RouterConfig;
  private routes: Map<string, ModelRoute>;

  constructor(config: RouterConfig) {
    this.config = config;
    this.routes = new Map();
    this.initializeRoutes();
  }

  private initializeRoutes(): void {
    const geminiRoutes: ModelRoute[] = [
      {
        provider: 'gemini',
        model: 'gemini-2.5-flash',
        priority: 10,
        maxOutputTokens: 65536,
        capabilities: ['text', 'json', 'fast']
      },
      {
        provider: 'gemini',
        model: 'gemini-2.5-pro',
        priority: 8,
        maxOutputTokens: 65536,
        capabilities: ['text', 'json', 'reasoning']
      },
      {
        provider: 'gemini',
        model: 'gemini-2.0-flash',
        priority: 7,
        maxOutputTokens: 8192,
        capabilities: ['text', 'json', 'fast']
      }
    ];

    const openrouterRoutes: ModelRoute[] = [
      {
        provider: 'openrouter',
        model: 'google/gemini-2.5-flash',
        priority: 10,
        maxOutputTokens: 65536,
        capabilities: ['text', 'json', 'fast']
      },
      {
        provider: 'openrouter',
        model: 'openai/gpt-4o-mini',
        priority: 8,
        maxOutputTokens: 16384,
        capabilities: ['text', 'json', 'fast']
      },
      {
        provider: 'openrouter',
        model: 'anthropic/claude-3.5-sonnet',
        priority: 7,
        maxOutputTokens: 8192,
        capabilities: ['text', 'json', 'reasoning']
      }
    ];

    [...geminiRoutes, ...openrouterRoutes, ...(this.config.customRoutes || [])].forEach(
      route => {
        this.routes.set(`${route.provider}:${route.model}`, route);
      }
    );
  }

  /**
   * Select a model for the given requirements. A preferred model the router
   * does not know is still honoured with a conservative output ceiling.
   */
  selectModel(requirements: {
    capabilities?: string[];
    provider?: ModelProvider;
    preferredModel?: string;
  }): ModelRoute {
    const { capabilities = [], preferredModel } = requirements;
    const provider = requirements.provider ?? this.config.defaultProvider;

    if (preferredModel) {
      const route = this.routes.get(`${provider}:${preferredModel}`);
      if (route) {
        return route;
      }
      return {
        provider,
        model: preferredModel,
        priority: 0,
        maxOutputTokens: DEFAULT_CUSTOM_OUTPUT_TOKENS,
        capabilities: ['text', 'json']
      };
    }

    const candidates = Array.from(this.routes.values())
      .filter(r => r.provider === provider)
      .filter(route => capabilities.every(cap => route.capabilities.includes(cap)))
      .sort((a, b) => b.priority - a.priority);

    const selected = candidates[0];
    if (!selected) {
      throw new SynthError(
        'No suitable model found for requirements',
        'NO_MODEL_FOUND',
        { requirements }
      );
    }
    return selected;
  }

  getRoutes(): ModelRoute[] {
    return Array.from(this.routes.values());
  }

  addRoute(route: ModelRoute): void {
    this.routes.set(`${route.provider}:${route.model}`, route);
  }

  getModelConfig(route: ModelRoute): {
    provider: ModelProvider;
    model: string;
    apiKey?: string;
  } {
    return {
      provider: route.provider,
      model: route.model,
      apiKey: this.config.providerKeys[route.provider]
    };
  }
}
