import type pg from 'pg';
import { toSql } from 'pgvector';
import { DatabaseConfig } from '../config/database.js';
import type { BatchCheckpoint } from '../models/checkpoint.js';
import { isJudgmentStatus } from '../models/judgment.js';
import type {
  Chunk,
  Judgment,
  JudgmentStatus,
  NewJudgment,
  ReportabilityScore,
} from '../models/judgment.js';
import { NOT_CLASSIFIED, isPracticeAreaLabel } from '../models/practiceArea.js';
import type { PracticeAreaLabel } from '../models/practiceArea.js';
import type {
  ClassificationQuery,
  JudgmentRepository,
  StageWrite,
  StatusQuery,
} from './JudgmentRepository.js';

// ============================================================================
// Row types
// ============================================================================

interface JudgmentRow {
  id: string;
  court: string;
  year: number;
  source_url: string;
  title: string;
  text: string;
  status: string;
  neutral_citation: string | null;
  case_number: string | null;
  judgment_date: string | null;
  court_name: string | null;
  parties: unknown;
  judges: unknown;
  short_summary: string | null;
  reportability: ReportabilityScore | null;
  long_summary: string | null;
  practice_area: string | null;
  featured: boolean;
  created_at: Date;
  updated_at: Date;
}

interface ChunkRow {
  id: string;
  judgment_id: string;
  chunk_index: number;
  start_offset: number;
  end_offset: number;
  text: string;
}

interface CheckpointRow {
  key: string;
  stage: number;
  completed_ids: unknown;
  updated_at: Date;
}

const JUDGMENT_COLUMNS = `
  id, court, year, source_url, title, text, status,
  neutral_citation, case_number, to_char(judgment_date, 'YYYY-MM-DD') AS judgment_date,
  court_name, parties, judges, short_summary, reportability, long_summary,
  practice_area, featured, created_at, updated_at`;

function stringArray(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((item): item is string => typeof item === 'string') : [];
}

function toJudgment(row: JudgmentRow): Judgment {
  if (!isJudgmentStatus(row.status)) {
    throw new Error(`Judgment ${row.id} has unknown status "${row.status}"`);
  }
  return {
    id: row.id,
    court: row.court,
    year: row.year,
    sourceUrl: row.source_url,
    title: row.title,
    text: row.text,
    status: row.status,
    metadata: {
      neutralCitation: row.neutral_citation,
      caseNumber: row.case_number,
      judgmentDate: row.judgment_date,
      courtName: row.court_name,
      parties: stringArray(row.parties),
      judges: stringArray(row.judges),
    },
    shortSummary: row.short_summary,
    reportability: row.reportability,
    longSummary: row.long_summary,
    practiceArea: isPracticeAreaLabel(row.practice_area) ? row.practice_area : null,
    featured: row.featured,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

/**
 * JudgmentRepository on PostgreSQL + pgvector
 *
 * Table layout: sql/schema.sql.
 */
export class PgJudgmentRepository implements JudgmentRepository {
  async findById(id: string): Promise<Judgment | null> {
    const rows = await DatabaseConfig.query<JudgmentRow>(
      `SELECT ${JUDGMENT_COLUMNS} FROM judgments WHERE id = $1`,
      [id]
    );
    return rows[0] ? toJudgment(rows[0]) : null;
  }

  async selectByStatus(query: StatusQuery): Promise<Judgment[]> {
    const params: unknown[] = [query.status, query.year, query.limit];
    let courtFilter = '';
    if (query.court) {
      params.push(query.court);
      courtFilter = `AND court = $${params.length}`;
    }
    let checkpointFilter = '';
    if (query.excludeCheckpoint) {
      params.push(query.excludeCheckpoint);
      checkpointFilter = `AND NOT EXISTS (
            SELECT 1 FROM pipeline_checkpoints c
             WHERE c.key = $${params.length} AND c.completed_ids ? judgments.id::text)`;
    }

    const rows = await DatabaseConfig.query<JudgmentRow>(
      `SELECT ${JUDGMENT_COLUMNS}
         FROM judgments
        WHERE status = $1
          AND year = $2
          ${courtFilter}
          ${checkpointFilter}
        ORDER BY created_at, id
        LIMIT $3`,
      params
    );
    return rows.map(toJudgment);
  }

  async sourceUrlExists(sourceUrl: string): Promise<boolean> {
    const rows = await DatabaseConfig.query<{ exists: boolean }>(
      'SELECT EXISTS (SELECT 1 FROM judgments WHERE source_url = $1) AS exists',
      [sourceUrl]
    );
    return rows[0]?.exists ?? false;
  }

  async insertScraped(input: NewJudgment): Promise<Judgment | null> {
    const rows = await DatabaseConfig.query<JudgmentRow>(
      `INSERT INTO judgments (court, year, source_url, title, text, status)
       VALUES ($1, $2, $3, $4, $5, 'scraped')
       ON CONFLICT (source_url) DO NOTHING
       RETURNING ${JUDGMENT_COLUMNS}`,
      [input.court, input.year, input.sourceUrl, input.title, input.text]
    );
    return rows[0] ? toJudgment(rows[0]) : null;
  }

  async advance(id: string, from: JudgmentStatus, to: JudgmentStatus, write: StageWrite): Promise<boolean> {
    return DatabaseConfig.withTransaction(async (client) => {
      // Row lock; the status check and the write see the same version
      const locked = await client.query<{ status: string }>(
        'SELECT status FROM judgments WHERE id = $1 FOR UPDATE',
        [id]
      );
      if (locked.rows[0]?.status !== from) {
        return false;
      }

      const assignments: string[] = ['status = $2', 'updated_at = NOW()'];
      const params: unknown[] = [id, to];
      const set = (column: string, value: unknown, cast = '') => {
        params.push(value);
        assignments.push(`${column} = $${params.length}${cast}`);
      };

      if (write.metadata) {
        set('neutral_citation', write.metadata.neutralCitation);
        set('case_number', write.metadata.caseNumber);
        set('judgment_date', write.metadata.judgmentDate, '::date');
        set('court_name', write.metadata.courtName);
        set('parties', JSON.stringify(write.metadata.parties), '::jsonb');
        set('judges', JSON.stringify(write.metadata.judges), '::jsonb');
      }
      if (write.shortSummary !== undefined) {
        set('short_summary', write.shortSummary);
      }
      if (write.reportability) {
        set('reportability', JSON.stringify(write.reportability), '::jsonb');
        set('reportability_score', write.reportability.score);
      }
      if (write.longSummary !== undefined) {
        set('long_summary', write.longSummary);
      }
      if (write.practiceArea !== undefined) {
        set('practice_area', write.practiceArea);
      }
      if (write.embeddings) {
        set('embedding', toSql(write.embeddings.judgmentVector));
        set('embedding_model', write.embeddings.model);
      }

      if (write.chunks) {
        await this.replaceChunks(client, id, write);
      }
      if (write.embeddings) {
        for (const { chunkId, vector } of write.embeddings.vectors) {
          await client.query(
            `INSERT INTO chunk_embeddings (chunk_id, embedding, model)
             VALUES ($1, $2, $3)
             ON CONFLICT (chunk_id) DO UPDATE
               SET embedding = EXCLUDED.embedding, model = EXCLUDED.model, created_at = NOW()`,
            [chunkId, toSql(vector), write.embeddings.model]
          );
        }
      }

      await client.query(`UPDATE judgments SET ${assignments.join(', ')} WHERE id = $1`, params);
      return true;
    });
  }

  private async replaceChunks(client: pg.PoolClient, judgmentId: string, write: StageWrite): Promise<void> {
    // Old chunks take their embeddings with them (ON DELETE CASCADE)
    await client.query('DELETE FROM judgment_chunks WHERE judgment_id = $1', [judgmentId]);
    for (const chunk of write.chunks ?? []) {
      await client.query(
        `INSERT INTO judgment_chunks (judgment_id, chunk_index, start_offset, end_offset, text)
         VALUES ($1, $2, $3, $4, $5)`,
        [judgmentId, chunk.index, chunk.start, chunk.end, chunk.text]
      );
    }
  }

  async getChunks(judgmentId: string): Promise<Chunk[]> {
    const rows = await DatabaseConfig.query<ChunkRow>(
      `SELECT id, judgment_id, chunk_index, start_offset, end_offset, text
         FROM judgment_chunks
        WHERE judgment_id = $1
        ORDER BY chunk_index`,
      [judgmentId]
    );
    return rows.map((row) => ({
      id: row.id,
      judgmentId: row.judgment_id,
      index: row.chunk_index,
      start: row.start_offset,
      end: row.end_offset,
      text: row.text,
    }));
  }

  async selectForClassification(query: ClassificationQuery): Promise<Judgment[]> {
    const rows = await DatabaseConfig.query<JudgmentRow>(
      `SELECT ${JUDGMENT_COLUMNS}
         FROM judgments
        WHERE status IN ('long_summarized', 'classified')
          AND short_summary IS NOT NULL
          AND ($1::boolean OR practice_area IS NULL OR practice_area = $2)
        ORDER BY judgment_date NULLS LAST, id
        LIMIT $3`,
      [query.force, NOT_CLASSIFIED, query.limit]
    );
    return rows.map(toJudgment);
  }

  async setPracticeArea(id: string, area: PracticeAreaLabel): Promise<void> {
    await DatabaseConfig.query(
      'UPDATE judgments SET practice_area = $2, updated_at = NOW() WHERE id = $1',
      [id, area]
    );
  }

  async findFeaturedCandidate(from: string, to: string): Promise<Judgment | null> {
    const rows = await DatabaseConfig.query<JudgmentRow>(
      `SELECT ${JUDGMENT_COLUMNS}
         FROM judgments
        WHERE reportability_score > 0
          AND judgment_date BETWEEN $1::date AND $2::date
        ORDER BY reportability_score DESC, judgment_date DESC
        LIMIT 1`,
      [from, to]
    );
    return rows[0] ? toJudgment(rows[0]) : null;
  }

  async setFeatured(id: string | null): Promise<void> {
    await DatabaseConfig.withTransaction(async (client) => {
      await client.query('UPDATE judgments SET featured = FALSE WHERE featured');
      if (id) {
        await client.query('UPDATE judgments SET featured = TRUE, updated_at = NOW() WHERE id = $1', [id]);
      }
    });
  }

  async loadCheckpoint(key: string): Promise<BatchCheckpoint | null> {
    const rows = await DatabaseConfig.query<CheckpointRow>(
      'SELECT key, stage, completed_ids, updated_at FROM pipeline_checkpoints WHERE key = $1',
      [key]
    );
    const row = rows[0];
    return row
      ? { key: row.key, stage: row.stage, completedIds: stringArray(row.completed_ids), updatedAt: row.updated_at }
      : null;
  }

  async appendCheckpoint(key: string, stage: number, itemId: string): Promise<void> {
    await DatabaseConfig.query(
      `INSERT INTO pipeline_checkpoints (key, stage, completed_ids, updated_at)
       VALUES ($1, $2, jsonb_build_array($3::text), NOW())
       ON CONFLICT (key) DO UPDATE
         SET completed_ids = CASE
               WHEN pipeline_checkpoints.completed_ids ? $3::text THEN pipeline_checkpoints.completed_ids
               ELSE pipeline_checkpoints.completed_ids || jsonb_build_array($3::text)
             END,
             updated_at = NOW()`,
      [key, stage, itemId]
    );
  }

  async deleteCheckpoint(key: string): Promise<void> {
    await DatabaseConfig.query('DELETE FROM pipeline_checkpoints WHERE key = $1', [key]);
  }
}
