/**
 * Shared test inputs
 */

import { DEFAULT_CONFIG, OptimizerConfigSchema, deepMerge, type OptimizerConfig } from '../../optimizer/config';
import { HttpClient, type FetchLike } from '../../optimizer/http/httpClient';
import type { AlignmentThresholds } from '../../optimizer/types';

/**
 * Validated configuration with placeholder keys
 */
export function testConfig(overrides: Record<string, unknown> = {}): OptimizerConfig {
  const base = deepMerge(DEFAULT_CONFIG, {
    llm: { apiKey: 'test-secret' },
    embeddings: { apiKey: 'test-secret' }
  });
  return OptimizerConfigSchema.parse(deepMerge(base, overrides));
}

export function testHttp(fetch: FetchLike): HttpClient {
  return new HttpClient({ timeoutMs: 1000, userAgent: 'test-agent', fetch });
}

export const THRESHOLDS: AlignmentThresholds = {
  keep: 0.8,
  rewrite: 0.5,
  evidence: 0.5,
  keywordCoverage: 0.5
};

export const SAMPLE_RESUME = String.raw`\documentclass{article}
\begin{document}
\section{Experience}
\subsection{Acme Corp}
\begin{itemize}
  \item Built data pipelines in Python processing 2TB daily
  \item Organized the team offsite
\end{itemize}
\section{Projects}
\begin{itemize}
  \item Wrote a \textbf{Rust} key-value store
\end{itemize}
\end{document}
`;

export const JOB_PAGE_LINES = [
  'Senior Backend Engineer',
  'We are looking for an engineer to build distributed data services.',
  'Design and operate APIs in Go and Rust',
  'Requirements: 5+ years of backend experience with PostgreSQL and Kafka',
  'Experience running services on Kubernetes'
];

/**
 * Job board page with the description in the board's own container
 */
export function linkedInJobPage(lines: string[] = JOB_PAGE_LINES): string {
  const [title, intro, ...items] = lines;
  return `<html><head><title>Job</title><script>window.tracking = {};</script></head>
<body>
<nav>Jobs Home</nav>
<div class="show-more-less-html__markup">
<h2>${title}</h2>
<p>${intro}</p>
<ul>
${items.map(item => `<li>${item}</li>`).join('\n')}
</ul>
</div>
<footer>About us</footer>
</body></html>`;
}
