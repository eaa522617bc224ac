/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import type {
  MetricKind,
  MetricLabels,
  MetricsRecorder,
} from '../src/types.js';

export class RecordingMetricsRecorder implements MetricsRecorder {
  readonly counts: { kind: MetricKind; labels: Record<string, string> }[] =
    [];

  count<K extends MetricKind>(kind: K, labels: MetricLabels[K]): void {
    this.counts.push({ kind, labels: { ...labels } });
  }

  labelsOf(kind: MetricKind): Record<string, string>[] {
    return this.counts
      .filter((count) => count.kind === kind)
      .map(({ labels }) => labels);
  }
}
