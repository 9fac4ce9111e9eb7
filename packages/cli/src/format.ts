import { humanizeDuration } from '@lp-builds/shared';
import type { BuilderQueueStatus, BuildStatusByArchitecture, BuildTarget, SnapRecipe } from '@lp-builds/shared';

function pad(value: string, width: number): string {
  return value.padEnd(width);
}

export function formatTarget(target: BuildTarget): string[] {
  return [
    `Board:             ${target.board}`,
    `System:            ${target.systemLabel}`,
    `Codename:          ${target.codename}`,
    `Project:           ${target.project}`,
    `Architecture:      ${target.architecture}`,
    `Sub-architecture:  ${target.subArchitecture || '(none)'}`,
  ];
}

export function formatRecipe(recipe: SnapRecipe): string[] {
  return [
    `Store name:  ${recipe.storeName}`,
    `Recipe:      ${recipe.identityHash}`,
    `Git URL:     ${recipe.gitUrl}`,
    `Archive:     ${recipe.autoBuildArchive ?? '(none)'}`,
    `Pocket:      ${recipe.autoBuildPocket ?? '(none)'}`,
    `Processors:  ${recipe.processors ? recipe.processors.join(', ') : '(not fetched)'}`,
    `Link:        ${recipe.links.self}`,
  ];
}

export function formatBuildStatus(status: BuildStatusByArchitecture): string[] {
  const archs = Object.keys(status);
  if (archs.length === 0) return ['No recent builds'];

  return archs.map((arch) => {
    const entry = status[arch];
    const upload = entry?.storeUploadStatus ?? 'n/a';
    return `${pad(arch, 8)} ${pad(entry?.buildState ?? '', 22)} upload: ${upload}`;
  });
}

export function formatQueueStatus(status: BuilderQueueStatus): string[] {
  return Object.entries(status).map(([arch, queue]) => {
    const jobs = `${queue.pendingJobs} job${queue.pendingJobs === 1 ? '' : 's'}`;
    return `${pad(arch, 8)} ${pad(jobs, 9)} total: ${pad(humanizeDuration(queue.totalJobsDuration), 11)} wait: ${humanizeDuration(queue.estimatedDuration)}`;
  });
}
