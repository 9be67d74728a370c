/**
 * Baseline descriptor loader.
 *
 * Reads the YAML (or JSON) document describing the patch baseline to create,
 * validates it, and maps it onto the SSM CreatePatchBaseline request.
 */

import { readFile } from 'fs/promises';
import yaml from 'js-yaml';
import { z } from 'zod';
import {
  OperatingSystem,
  PatchComplianceLevel,
  PatchFilterKey,
  type CreatePatchBaselineCommandInput,
} from '@aws-sdk/client-ssm';
import type { BaselineDescriptor } from '@shared/types';
import { LoadError, describeError } from '@shared/errors';
import { setupLogger } from '@shared/utils/logger';

/**
 * Document schema. Keys are snake_case in the file, camelCase in memory.
 */
const BaselineDocumentSchema = z.object({
  name: z.string().min(3).max(128),
  description: z.string().max(1024).optional(),
  operating_system: z.nativeEnum(OperatingSystem),
  patch_group: z.string().min(1).max(256),
  approval_rules: z
    .array(
      z.object({
        approve_after_days: z.number().int().min(0).max(360),
        compliance_level: z.nativeEnum(PatchComplianceLevel).optional(),
        enable_non_security: z.boolean().optional(),
        filters: z
          .array(
            z.object({
              key: z.nativeEnum(PatchFilterKey),
              values: z.array(z.string().min(1)).min(1),
            })
          )
          .min(1),
      })
    )
    .min(1),
  approved_patches: z.array(z.string()).optional(),
  rejected_patches: z.array(z.string()).optional(),
});

type BaselineDocument = z.infer<typeof BaselineDocumentSchema>;

function toDescriptor(document: BaselineDocument): BaselineDescriptor {
  return {
    name: document.name,
    description: document.description,
    operatingSystem: document.operating_system,
    patchGroup: document.patch_group,
    approvalRules: document.approval_rules.map((rule) => ({
      approveAfterDays: rule.approve_after_days,
      complianceLevel: rule.compliance_level,
      enableNonSecurity: rule.enable_non_security,
      filters: rule.filters,
    })),
    approvedPatches: document.approved_patches,
    rejectedPatches: document.rejected_patches,
  };
}

/**
 * Parse and validate descriptor text.
 *
 * @param source - Document text
 * @param origin - Where the text came from, for error messages
 * @throws {LoadError} If the text is not YAML or does not match the schema
 */
export function parseBaselineDescriptor(source: string, origin: string): BaselineDescriptor {
  let document: unknown;
  try {
    document = yaml.load(source);
  } catch (error) {
    throw new LoadError(`Failed to parse baseline descriptor ${origin}: ${describeError(error)}`, {
      cause: error,
    });
  }

  const parsed = BaselineDocumentSchema.safeParse(document);
  if (!parsed.success) {
    const issues = parsed.error.errors.map(
      (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`
    );
    throw new LoadError(`Invalid baseline descriptor ${origin}: ${issues.join('; ')}`, {
      cause: parsed.error,
    });
  }

  return toDescriptor(parsed.data);
}

/**
 * Load a baseline descriptor from a file.
 *
 * @throws {LoadError} If the file is missing, unreadable or invalid
 */
export async function loadBaselineDescriptor(
  path: string,
  logLevel?: string
): Promise<BaselineDescriptor> {
  const logger = setupLogger('patch-scheduler:baseline', logLevel);
  logger.info(`Loading baseline descriptor from ${path}`);

  let source: string;
  try {
    source = await readFile(path, 'utf8');
  } catch (error) {
    throw new LoadError(`Could not read baseline descriptor ${path}: ${describeError(error)}`, {
      cause: error,
    });
  }

  const descriptor = parseBaselineDescriptor(source, path);
  logger.info(
    { name: descriptor.name, patchGroup: descriptor.patchGroup },
    'Baseline descriptor loaded'
  );
  return descriptor;
}

/**
 * Map a descriptor onto the CreatePatchBaseline request.
 */
export function toCreatePatchBaselineInput(
  descriptor: BaselineDescriptor
): CreatePatchBaselineCommandInput {
  return {
    Name: descriptor.name,
    Description: descriptor.description,
    OperatingSystem: descriptor.operatingSystem,
    ApprovalRules: {
      PatchRules: descriptor.approvalRules.map((rule) => ({
        ApproveAfterDays: rule.approveAfterDays,
        ComplianceLevel: rule.complianceLevel,
        EnableNonSecurity: rule.enableNonSecurity,
        PatchFilterGroup: {
          PatchFilters: rule.filters.map((filter) => ({
            Key: filter.key,
            Values: filter.values,
          })),
        },
      })),
    },
    ApprovedPatches: descriptor.approvedPatches,
    RejectedPatches: descriptor.rejectedPatches,
  };
}
