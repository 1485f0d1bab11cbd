import { CandidateRecord, SimilaritySearchParams } from "../../domain/interfaces/isimilarity.search";
import { cosineSimilarity } from "../../domain/utils/vector";

/**
 * A stored transcript segment: video metadata, segment offsets and text,
 * plus the segment's `embedding`.
 */
export type SegmentDocument = Record<string, unknown>;

function isEmbedding(value: unknown, dimensions: number): value is number[] {
  return (
    Array.isArray(value) &&
    value.length === dimensions &&
    value.every((v) => typeof v === "number" && Number.isFinite(v))
  );
}

// Drop storage-only fields and attach the computed score
export function toCandidateRecord(doc: SegmentDocument, similarity: number): CandidateRecord {
  const { _id, embedding, ...fields } = doc;
  return { ...fields, similarity };
}

/**
 * Score documents against the query and apply the search contract: the same
 * cosine value drives the threshold and the ordering, results are truncated
 * to maxCandidates. Documents without a usable embedding of the query's
 * dimension are skipped and counted, never scored.
 */
export function rankSegmentDocuments(
  docs: readonly SegmentDocument[],
  queryEmbedding: number[],
  { minSimilarity, maxCandidates }: SimilaritySearchParams
): CandidateRecord[] {
  const scored: Array<{ doc: SegmentDocument; similarity: number }> = [];
  let skipped = 0;
  for (const doc of docs) {
    if (!isEmbedding(doc.embedding, queryEmbedding.length)) {
      skipped++;
      continue;
    }
    const similarity = cosineSimilarity(queryEmbedding, doc.embedding);
    if (similarity >= minSimilarity) {
      scored.push({ doc, similarity });
    }
  }

  if (skipped > 0) {
    console.warn(
      `[SegmentScoring] Skipped ${skipped} segment(s) without a ${queryEmbedding.length}-dimensional embedding`
    );
  }

  return scored
    .sort((a, b) => b.similarity - a.similarity)
    .slice(0, maxCandidates)
    .map((s) => toCandidateRecord(s.doc, s.similarity));
}
