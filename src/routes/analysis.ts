// src/routes/analysis.ts
// Contract analysis endpoints. Each accepts either a JSON body
// { text, language? } or a multipart upload (field "file", ?language=).
//
//   POST /analyze            → ContractAnalysis
//   POST /assess-risk        → RiskAssessment
//   POST /check-compliance   → ComplianceResult
//   POST /analyze/full       → { analysis, risk, compliance }
//   POST /clauses/explain    → ClauseDetail (JSON only)

import fp from 'fastify-plugin';
import multipart from '@fastify/multipart';
import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { isJsonObject } from '../ai/jsonRepair';
import { parseLanguage, type Language } from '../ai/localization';
import { runFullAnalysis, type AnalysisServices } from '../analysis';
import { normalizeRiskLevel } from '../analysis/normalize';
import { extractText, UnsupportedDocumentError } from '../documents/textExtraction';
import { getRateLimitConfig } from '../middleware/rateLimit';
import { getRequestLogger } from '../observability/requestLogger';
import type { Clause } from '../types/analysis';

export interface AnalysisRoutesOptions {
  services: AnalysisServices;
  limits: {
    maxTextLength: number;
    uploadMaxBytes: number;
  };
}

type AnalysisQuery = { language?: string };

/* ----------------------------- input ----------------------------- */

type ContractInput =
  | { ok: true; text: string; language: Language }
  | { ok: false; status: number; error: string; message: string };

function reject(status: number, error: string, message: string): ContractInput {
  return { ok: false, status, error, message };
}

async function readContractInput(
  req: FastifyRequest<{ Querystring: AnalysisQuery }>,
  maxTextLength: number
): Promise<ContractInput> {
  let text: string;
  let language: Language;

  if (req.isMultipart()) {
    const file = await req.file();
    if (!file) return reject(400, 'file_required', 'Multipart request has no "file" field');

    const buffer = await file.toBuffer();
    let extracted: string | null;
    try {
      extracted = await extractText({ filename: file.filename, buffer });
    } catch (err) {
      if (err instanceof UnsupportedDocumentError) return reject(415, 'unsupported_media_type', err.message);
      throw err;
    }
    if (extracted === null) {
      return reject(422, 'no_text_extracted', `Could not extract any text from ${file.filename}`);
    }
    text = extracted;
    language = parseLanguage(req.query.language);
  } else {
    const body = req.body;
    if (!isJsonObject(body) || typeof body.text !== 'string' || !body.text.trim()) {
      return reject(400, 'text_required', 'Body must be JSON with a non-empty "text" string');
    }
    text = body.text;
    language = parseLanguage(body.language ?? req.query.language);
  }

  if (text.length > maxTextLength) {
    return reject(413, 'text_too_long', `Contract text exceeds ${maxTextLength} characters`);
  }
  return { ok: true, text, language };
}

function sendRejection(reply: FastifyReply, input: Extract<ContractInput, { ok: false }>) {
  return reply.code(input.status).send({ error: input.error, message: input.message });
}

/** Clause from the request body; unknown fields are dropped. */
function readClause(raw: unknown): Partial<Clause> | null {
  if (!isJsonObject(raw)) return null;
  const clause: Partial<Clause> = {};
  if (typeof raw.type === 'string') clause.type = raw.type;
  const risk = normalizeRiskLevel(raw.risk_level);
  if (risk) clause.risk_level = risk;
  if (typeof raw.explanation === 'string') clause.explanation = raw.explanation;
  return clause;
}

/* ----------------------------- routes ----------------------------- */

async function analysisRoutes(app: FastifyInstance, opts: AnalysisRoutesOptions) {
  const { services, limits } = opts;

  await app.register(multipart, { limits: { fileSize: limits.uploadMaxBytes, files: 1 } });

  app.post<{ Querystring: AnalysisQuery }>(
    '/analyze',
    getRateLimitConfig('single'),
    async (req, reply) => {
      const input = await readContractInput(req, limits.maxTextLength);
      if (!input.ok) return sendRejection(reply, input);
      getRequestLogger(req).info({ textLength: input.text.length, language: input.language }, 'analyze');
      return reply.send(await services.analyzer.analyze(input.text, input.language));
    }
  );

  app.post<{ Querystring: AnalysisQuery }>(
    '/assess-risk',
    getRateLimitConfig('single'),
    async (req, reply) => {
      const input = await readContractInput(req, limits.maxTextLength);
      if (!input.ok) return sendRejection(reply, input);
      return reply.send(await services.riskScorer.assess(input.text, input.language));
    }
  );

  app.post<{ Querystring: AnalysisQuery }>(
    '/check-compliance',
    getRateLimitConfig('single'),
    async (req, reply) => {
      const input = await readContractInput(req, limits.maxTextLength);
      if (!input.ok) return sendRejection(reply, input);
      return reply.send(await services.complianceChecker.check(input.text, input.language));
    }
  );

  app.post<{ Querystring: AnalysisQuery }>(
    '/analyze/full',
    getRateLimitConfig('full'),
    async (req, reply) => {
      const input = await readContractInput(req, limits.maxTextLength);
      if (!input.ok) return sendRejection(reply, input);
      getRequestLogger(req).info({ textLength: input.text.length, language: input.language }, 'full analysis');
      return reply.send(await runFullAnalysis(services, input.text, input.language));
    }
  );

  app.post(
    '/clauses/explain',
    getRateLimitConfig('clauseDetail'),
    async (req, reply) => {
      const body = req.body;
      const clause = isJsonObject(body) ? readClause(body.clause) : null;
      if (!isJsonObject(body) || !clause) {
        return reply.code(400).send({ error: 'clause_required', message: 'Body must include a "clause" object' });
      }
      const text = typeof body.text === 'string' ? body.text : '';
      if (text.length > limits.maxTextLength) {
        return reply.code(413).send({ error: 'text_too_long', message: `Contract text exceeds ${limits.maxTextLength} characters` });
      }
      return reply.send(await services.analyzer.explainClause(clause, text, parseLanguage(body.language)));
    }
  );
}

export default fp(analysisRoutes, { name: 'analysis-routes' });
