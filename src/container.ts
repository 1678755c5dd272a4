/**
 * Dependency wiring.
 * Builds every service from injected repositories and providers; tests pass
 * in-memory doubles, production passes the real implementations.
 */

import type { IEpisodeRepository } from './repositories/IEpisodeRepository.js';
import type { IStructuredViewRepository } from './repositories/IStructuredViewRepository.js';
import type { IEmbeddingProvider } from './providers/IEmbeddingProvider.js';
import type { IGenerationProvider } from './providers/IGenerationProvider.js';
import type { ILogProvider } from './providers/ILogProvider.js';
import type { IIndexCacheStore } from './stores/IIndexCacheStore.js';
import type { Middleware } from './middleware/pipeline.js';
import { EpisodeService } from './services/EpisodeService.js';
import { IndexService, type IndexServiceOptions } from './services/IndexService.js';
import { RetrievalService, type RetrievalOptions } from './services/RetrievalService.js';
import {
  StructuredQueryService,
  type StructuredQueryOptions,
} from './services/StructuredQueryService.js';
import {
  GeneralKnowledgeService,
  type GeneralKnowledgeOptions,
} from './services/GeneralKnowledgeService.js';
import { QueryRouter, type QueryRouterOptions } from './services/QueryRouter.js';
import { createLoggingMiddleware } from './middleware/logging.js';
import { createErrorHandler } from './middleware/error-handler.js';

export interface Container {
  episodeService: EpisodeService;
  indexService: IndexService;
  retrievalService: RetrievalService;
  /** Null when no structured view store is configured. */
  structuredQueryService: StructuredQueryService | null;
  queryRouter: QueryRouter;
  logProvider: ILogProvider;
  logging: Middleware;
  errorHandler: Middleware;
}

export interface ContainerDeps {
  episodeRepo: IEpisodeRepository;
  viewRepo?: IStructuredViewRepository;
  embeddingProvider: IEmbeddingProvider;
  generationProvider: IGenerationProvider;
  cacheStore: IIndexCacheStore;
  logProvider: ILogProvider;
}

export interface ContainerOptions {
  index?: IndexServiceOptions;
  retrieval?: RetrievalOptions;
  structured?: StructuredQueryOptions;
  general?: GeneralKnowledgeOptions;
  router?: QueryRouterOptions;
  /** Register the general-knowledge fallback. Default: true. */
  generalKnowledge?: boolean;
}

export function createContainer(deps: ContainerDeps, options: ContainerOptions = {}): Container {
  const episodeService = new EpisodeService(deps.episodeRepo, deps.logProvider);
  const indexService = new IndexService(
    episodeService,
    deps.embeddingProvider,
    deps.cacheStore,
    deps.logProvider,
    options.index
  );
  const retrievalService = new RetrievalService(
    indexService,
    episodeService,
    deps.embeddingProvider,
    deps.generationProvider,
    deps.logProvider,
    options.retrieval
  );
  const structuredQueryService = deps.viewRepo
    ? new StructuredQueryService(
        deps.viewRepo,
        deps.generationProvider,
        deps.logProvider,
        options.structured
      )
    : null;

  const queryRouter = new QueryRouter(deps.logProvider, options.router).register(
    retrievalService
  );
  if (structuredQueryService) queryRouter.register(structuredQueryService);
  if (options.generalKnowledge ?? true) {
    queryRouter.register(
      new GeneralKnowledgeService(deps.generationProvider, deps.logProvider, options.general)
    );
  }

  return {
    episodeService,
    indexService,
    retrievalService,
    structuredQueryService,
    queryRouter,
    logProvider: deps.logProvider,
    logging: createLoggingMiddleware(deps.logProvider),
    errorHandler: createErrorHandler(deps.logProvider),
  };
}
