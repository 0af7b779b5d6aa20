import { chunkSection } from '../analysis/chunker.js';
import { locateRiskSection } from '../analysis/locator.js';
import { scoreChunks } from '../analysis/scorer.js';
import { errorMessage } from '../core/errors.js';
import { parseDocument, parseSection, serializeDocument, serializeSection } from '../core/serialize.js';
import type { NormalizedDocument, RiskSection } from '../core/types.js';
import type { CacheStage } from '../tools/cache.js';
import { normalizeFiling } from '../tools/normalizer.js';
import type { PipelineContext, PipelineStage, YearState } from './types.js';

function years(ctx: PipelineContext): YearState[] {
  return [ctx.prior, ctx.current];
}

function missing(what: string, year: YearState): Error {
  return new Error(`Stage ordering violated: no ${what} for fiscal year ${year.fiscalYear}`);
}

// The cache is optional and advisory: a failing store is logged, never fatal.

async function cacheGet(ctx: PipelineContext, fiscalYear: number, stage: CacheStage): Promise<string | null> {
  const { cache } = ctx.deps;
  if (!cache) return null;
  try {
    return await cache.get({ company: ctx.request.company, fiscalYear, stage });
  } catch (err) {
    ctx.log.warn({ fiscalYear, stage, err: errorMessage(err) }, 'cache read failed');
    return null;
  }
}

async function cachePut(ctx: PipelineContext, fiscalYear: number, stage: CacheStage, value: string): Promise<void> {
  const { cache } = ctx.deps;
  if (!cache) return;
  try {
    const stored = await cache.put({ company: ctx.request.company, fiscalYear, stage }, value);
    if (!stored) ctx.log.debug({ fiscalYear, stage }, 'cache entry already present');
  } catch (err) {
    ctx.log.warn({ fiscalYear, stage, err: errorMessage(err) }, 'cache write failed');
  }
}

async function cachedSection(ctx: PipelineContext, fiscalYear: number): Promise<RiskSection | null> {
  const json = await cacheGet(ctx, fiscalYear, 'section');
  if (json === null) return null;
  const section = parseSection(json);
  if (!section) ctx.log.warn({ fiscalYear }, 'ignoring unreadable cached section');
  return section;
}

async function cachedDocument(ctx: PipelineContext, fiscalYear: number): Promise<NormalizedDocument | null> {
  const json = await cacheGet(ctx, fiscalYear, 'normalized');
  if (json === null) return null;
  const doc = parseDocument(json);
  if (!doc) ctx.log.warn({ fiscalYear }, 'ignoring unreadable cached document');
  return doc;
}

/**
 * The five stages for one company/year-pair. Each stage handles the prior
 * year, then the current year; later cache hits let earlier stages skip work.
 */
export function buildPipeline(): PipelineStage[] {
  return [
    {
      name: 'retrieve',
      execute: async (ctx) => {
        let fetched = false;
        for (const year of years(ctx)) {
          ctx.activeYear = year.fiscalYear;
          const section = await cachedSection(ctx, year.fiscalYear);
          if (section) {
            year.section = section;
            continue;
          }
          const doc = await cachedDocument(ctx, year.fiscalYear);
          if (doc) {
            year.document = doc;
            continue;
          }
          year.raw = await ctx.deps.retriever.retrieve(ctx.request.company, year.fiscalYear, ctx.options.signal);
          fetched = true;
        }
        return fetched ? 'passed' : 'cached';
      },
    },
    {
      name: 'normalize',
      execute: async (ctx) => {
        let computed = false;
        for (const year of years(ctx)) {
          ctx.activeYear = year.fiscalYear;
          if (year.section || year.document) continue;
          if (!year.raw) throw missing('raw filing', year);
          year.document = normalizeFiling(year.raw);
          computed = true;
          await cachePut(ctx, year.fiscalYear, 'normalized', serializeDocument(year.document));
        }
        return computed ? 'passed' : 'cached';
      },
    },
    {
      name: 'locate',
      execute: async (ctx) => {
        let computed = false;
        for (const year of years(ctx)) {
          ctx.activeYear = year.fiscalYear;
          if (year.section) continue;
          if (!year.document) throw missing('normalized document', year);
          year.section = locateRiskSection(year.document);
          computed = true;
          ctx.log.debug(
            { fiscalYear: year.fiscalYear, confidence: year.section.confidence, end: year.section.endHeading },
            'located risk factors'
          );
          await cachePut(ctx, year.fiscalYear, 'section', serializeSection(year.section));
        }
        return computed ? 'passed' : 'cached';
      },
    },
    {
      name: 'chunk',
      execute: async (ctx) => {
        for (const year of years(ctx)) {
          ctx.activeYear = year.fiscalYear;
          if (!year.section) throw missing('risk section', year);
          year.chunks = [...chunkSection(year.section, ctx.options.chunk)];
        }
        ctx.activeYear = null;
        return 'passed';
      },
    },
    {
      name: 'score',
      execute: async (ctx) => {
        const { prior, current } = ctx;
        if (!prior.section || !prior.chunks) throw missing('chunks', prior);
        if (!current.section || !current.chunks) throw missing('chunks', current);
        ctx.record = await scoreChunks(prior.section, current.section, prior.chunks, current.chunks, {
          provider: ctx.deps.provider,
          chunk: ctx.options.chunk,
          rubric: ctx.options.rubric,
          aggregation: ctx.options.aggregation,
          concurrency: ctx.options.analysisConcurrency,
          signal: ctx.options.signal,
          logger: ctx.log,
        });
        return 'passed';
      },
    },
  ];
}
