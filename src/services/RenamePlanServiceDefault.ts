import path from "node:path";

import type { Logger } from "~shared/Logger";
import { type Result, err, ok } from "~shared/utils/Result";

import type { PhotoGroup } from "@/types";

import type { FileOperator } from "./FileOperator";
import {
  DEFAULT_SEQUENCE_DIGITS,
  MAX_SEQUENCE_DIGITS,
  MIN_SEQUENCE_DIGITS,
  type NamingScheme,
  SEQUENCE_MARKER,
  type SchemeCollision,
  type SchemeValidationError,
  fillSequence,
  isValidSequenceDigits,
  missingFields,
  renderWithoutSequence,
} from "./NamingScheme";
import { hasImageMember } from "./PhotoGroupingServiceDefault";
import type {
  RenamePlan,
  RenamePlanEntry,
  RenamePlanOptions,
  RenamePlanService,
  SkippedGroup,
} from "./RenamePlanService";

type Candidate = {
  group: PhotoGroup;
  existingFiles: PhotoGroup["files"];
  missingFiles: string[];
  bucketKey: string;
};

function describeGroup(group: PhotoGroup): string {
  return path.join(group.directory, group.key);
}

function displayBucket(bucketKey: string): string {
  return bucketKey.split(SEQUENCE_MARKER).join("{sequence}");
}

/**
 * 依命名規則排出目標路徑。
 *
 * 例如 `{date}_{camera_model}_{sequence}`：
 *   IMG_0001 (2024-03-15, EOS R5) → 2024-03-15_EOS R5_001
 *   IMG_0002 (2024-03-15, EOS R5) → 2024-03-15_EOS R5_002
 *   DSC_0100 (2024-03-16, Z 6)    → 2024-03-16_Z 6_001
 */
export class RenamePlanServiceDefault implements RenamePlanService {
  private readonly fileOperator: FileOperator;
  private readonly logger: Logger;

  constructor(deps: { fileOperator: FileOperator; logger: Logger }) {
    this.fileOperator = deps.fileOperator;
    this.logger = deps.logger.extend("RenamePlanServiceDefault");
  }

  async plan(
    groups: readonly PhotoGroup[],
    scheme: NamingScheme,
    options: RenamePlanOptions
  ): Promise<Result<RenamePlan, SchemeValidationError>> {
    const sequenceDigits = options.sequenceDigits ?? DEFAULT_SEQUENCE_DIGITS;
    const invalidPolicy = options.invalidPolicy ?? "skip";
    if (!isValidSequenceDigits(sequenceDigits)) {
      return err({
        type: "INVALID_SCHEME",
        scheme: scheme.source,
        message: `序號位數必須是 ${MIN_SEQUENCE_DIGITS} 到 ${MAX_SEQUENCE_DIGITS}，收到 ${sequenceDigits}`,
      });
    }

    const logger = this.logger.extend("plan", { scheme: scheme.source });
    const destination = path.resolve(options.destination);
    const skipped: SkippedGroup[] = [];
    const candidates: Candidate[] = [];

    for (const group of groups) {
      const existingFiles: PhotoGroup["files"] = [];
      const missing: string[] = [];
      for (const file of group.files) {
        if (await this.fileOperator.exists(file.path)) existingFiles.push(file);
        else missing.push(file.path);
      }

      if (existingFiles.length === 0) {
        skipped.push({
          group,
          reason: "FILES_MISSING",
          message: `群組的檔案都已不存在: ${describeGroup(group)}`,
        });
        continue;
      }

      if (invalidPolicy === "skip") {
        if (!hasImageMember({ files: existingFiles })) {
          skipped.push({
            group,
            reason: "NO_IMAGE",
            message: `群組沒有影像檔: ${describeGroup(group)}`,
          });
          continue;
        }
        const lacking = missingFields(scheme, group.metadata);
        if (lacking.length > 0) {
          skipped.push({
            group,
            reason: "MISSING_FIELDS",
            message: `群組缺少欄位 ${lacking.join(", ")}: ${describeGroup(group)}`,
            missingFields: lacking,
          });
          continue;
        }
      }

      candidates.push({
        group,
        existingFiles,
        missingFiles: missing,
        bucketKey: renderWithoutSequence(scheme, group),
      });
    }

    const buckets = new Map<string, Candidate[]>();
    for (const candidate of candidates) {
      const bucket = buckets.get(candidate.bucketKey);
      if (bucket) bucket.push(candidate);
      else buckets.set(candidate.bucketKey, [candidate]);
    }

    if (!scheme.hasSequence) {
      const collisions: SchemeCollision[] = [...buckets.entries()]
        .filter(([, members]) => members.length > 1)
        .map(([bucketKey, members]) => ({
          path: displayBucket(bucketKey),
          groups: members.map((m) => describeGroup(m.group)),
        }));
      if (collisions.length > 0) {
        return err({
          type: "UNRESOLVED_COLLISION",
          scheme: scheme.source,
          message: `${collisions.length} 個目標路徑有多個群組，請在命名規則中加入 {sequence}`,
          collisions,
        });
      }
    }

    const entries: RenamePlanEntry[] = [];
    for (const [bucketKey, members] of buckets) {
      members.forEach((candidate, index) => {
        const sequence = scheme.hasSequence ? index + 1 : undefined;
        const relativePath =
          sequence === undefined
            ? bucketKey
            : fillSequence(scheme, bucketKey, sequence, sequenceDigits);
        entries.push({
          group: candidate.group,
          relativePath,
          ...(sequence === undefined ? {} : { sequence }),
          operations: candidate.existingFiles.map((file) => ({
            from: file.path,
            to: path.join(destination, relativePath + file.extension),
          })),
          missingFiles: candidate.missingFiles,
        });
      });
    }
    // 還原為發現順序
    const order = new Map(groups.map((group, index) => [group, index]));
    entries.sort((a, b) => (order.get(a.group) ?? 0) - (order.get(b.group) ?? 0));

    const duplicates = findDuplicateTargets(entries);
    if (duplicates.length > 0) {
      return err({
        type: "UNRESOLVED_COLLISION",
        scheme: scheme.source,
        message: `${duplicates.length} 個目標檔案重複`,
        collisions: duplicates,
      });
    }

    logger.info({
      emoji: "🗺️",
      entries: entries.length,
      skipped: skipped.length,
      buckets: buckets.size,
    })`已規劃 ${entries.length} 個群組，略過 ${skipped.length} 個`;

    return ok({ scheme, destination, entries, skipped });
  }
}

function findDuplicateTargets(entries: RenamePlanEntry[]): SchemeCollision[] {
  const owners = new Map<string, string[]>();
  for (const entry of entries) {
    for (const operation of entry.operations) {
      const list = owners.get(operation.to);
      const owner = describeGroup(entry.group);
      if (list) list.push(owner);
      else owners.set(operation.to, [owner]);
    }
  }
  return [...owners.entries()]
    .filter(([, list]) => list.length > 1)
    .map(([target, list]) => ({ path: target, groups: list }));
}
