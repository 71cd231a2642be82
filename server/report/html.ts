import { format } from "date-fns";
import { HEX_RECORD_DATA } from "../acquisition/preprocessor";
import type {
  AnomalyTag,
  DetectionReport,
  FilterPolicy,
  HexRecord,
  Submission,
  VerdictKind,
  VerdictRecord,
} from "../detection/types";

export interface ReportMeta {
  labName: string;
  generatedAt?: Date;
  compiledSources?: boolean;
  /** When given, each pair gets a side-by-side view of both submissions. */
  submissions?: Submission[];
}

const VERDICT_LABELS: Record<VerdictKind, { label: string; color: string }> = {
  "plagiarized": { label: "Plagiarized", color: "#e74c3c" },
  "invalid-submission": { label: "Invalid submission", color: "#f39c12" },
  "not-plagiarized": { label: "Not plagiarized", color: "#27ae60" },
};

const HTML_ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#39;",
};

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch);
}

function percent(score: number): string {
  return `${(score * 100).toFixed(1)}%`;
}

function describeFilter(filter: FilterPolicy): string {
  return filter.mode === "threshold"
    ? `source &gt; ${percent(filter.sourceThreshold)} or hex &gt; ${percent(filter.hexThreshold)}`
    : `top ${percent(filter.percent)} by ${escapeHtml(filter.metric)}`;
}

function anomalyList(studentId: string, tags: AnomalyTag[]): string {
  if (tags.length === 0) return "";
  const items = tags.map((t) => `<li><code>${escapeHtml(t.kind)}</code> ${escapeHtml(t.detail)}</li>`).join("");
  return `<div class="anomalies"><strong>${escapeHtml(studentId)}</strong><ul>${items}</ul></div>`;
}

function hexByte(value: number, width: number): string {
  return value.toString(16).toUpperCase().padStart(width, "0");
}

/** One line per data record: address, then its bytes. */
export function hexDump(records: HexRecord[]): string {
  return records
    .filter((r) => r.valid && r.type === HEX_RECORD_DATA)
    .map((r) => `${hexByte(r.address, 4)}: ${r.data.map((b) => hexByte(b, 2)).join(" ")}`)
    .join("\n");
}

function submissionPanel(studentId: string, submission: Submission | undefined): string {
  if (!submission) {
    return `<div class="panel"><h4>${escapeHtml(studentId)}</h4><p>Submission not available.</p></div>`;
  }
  const sources = submission.sourceFiles
    .map((f) => `<h5>${escapeHtml(f.name)}</h5><pre>${escapeHtml(f.text)}</pre>`)
    .join("");
  const dump = hexDump(submission.hexRecords);
  return `<div class="panel"><h4>${escapeHtml(studentId)}</h4>` +
    `${sources || "<p>No source files.</p>"}` +
    `<h5>Hex data</h5>${dump ? `<pre>${dump}</pre>` : "<p>No hex data.</p>"}</div>`;
}

function comparisonRow(v: VerdictRecord, byId: Map<string, Submission>): string {
  const [a, b] = v.submissionIds;
  return `<tr class="comparison"><td colspan="10"><details><summary>Side by side</summary>` +
    `<div class="side-by-side">${submissionPanel(a, byId.get(a))}${submissionPanel(b, byId.get(b))}</div>` +
    `</details></td></tr>`;
}

/** Every student in a plagiarized pair, with the students they were paired with. */
export function plagiarizedRoster(verdicts: VerdictRecord[]): Array<{ studentId: string; pairedWith: string[] }> {
  const partners = new Map<string, Set<string>>();
  const link = (from: string, to: string) => {
    const set = partners.get(from) ?? new Set<string>();
    set.add(to);
    partners.set(from, set);
  };
  for (const v of verdicts) {
    if (v.verdict !== "plagiarized") continue;
    const [a, b] = v.submissionIds;
    link(a, b);
    link(b, a);
  }
  return [...partners.keys()].sort().map((studentId) => ({
    studentId,
    pairedWith: [...(partners.get(studentId) ?? [])].sort(),
  }));
}

function verdictRow(v: VerdictRecord, index: number): string {
  const { label, color } = VERDICT_LABELS[v.verdict];
  const [a, b] = v.submissionIds;
  const warnings = anomalyList(a, v.anomalyTagsA) + anomalyList(b, v.anomalyTagsB);
  const invalid = v.invalidSubmissions.length > 0
    ? `<div class="invalid">Invalid: ${v.invalidSubmissions.map(escapeHtml).join(", ")}</div>`
    : "";

  return `<tr>
  <td>${index + 1}</td>
  <td>${escapeHtml(a)}</td>
  <td>${escapeHtml(b)}</td>
  <td>${percent(v.scores.source.lcs)}</td>
  <td>${percent(v.scores.source.levenshtein)}</td>
  <td>${percent(v.aggregateSourceScore)}</td>
  <td>${percent(v.scores.hex.lcs)}</td>
  <td>${percent(v.scores.hex.levenshtein)}</td>
  <td><span style="color: ${color}; font-weight: bold;">${label}</span></td>
  <td><div class="reason">${escapeHtml(v.reasoning)}</div>${invalid}${warnings}</td>
</tr>`;
}

/**
 * Static HTML document for one detection run.  No scripts; everything a
 * reviewer needs is in the tables.
 */
export function renderHtmlReport(report: DetectionReport, meta: ReportMeta): string {
  const generatedAt = format(meta.generatedAt ?? new Date(), "yyyy-MM-dd HH:mm");
  const { summary } = report;

  const invalidRows = report.invalidSubmissions
    .map((s) => `<tr><td>${escapeHtml(s.studentId)}</td><td>${escapeHtml(s.reason)}</td></tr>`)
    .join("\n");

  const byId = new Map((meta.submissions ?? []).map((sub) => [sub.studentId, sub]));
  const rows = report.verdicts
    .map((v, i) => meta.submissions ? `${verdictRow(v, i)}\n${comparisonRow(v, byId)}` : verdictRow(v, i))
    .join("\n");

  const roster = plagiarizedRoster(report.verdicts);
  const rosterRows = roster
    .map((r) => `<tr><td>${escapeHtml(r.studentId)}</td><td>${r.pairedWith.map(escapeHtml).join(", ")}</td></tr>`)
    .join("\n");

  return `<!DOCTYPE html>
<html lang="en">
<head>
<meta charset="utf-8">
<title>${escapeHtml(meta.labName)} plagiarism report</title>
<style>
  body { font-family: system-ui, sans-serif; margin: 2rem; color: #2c3e50; }
  table { border-collapse: collapse; width: 100%; margin-bottom: 2rem; }
  th, td { border: 1px solid #ddd; padding: 6px 8px; vertical-align: top; font-size: 14px; }
  th { background: #34495e; color: #fff; }
  .anomalies { color: #8e44ad; font-size: 12px; }
  .invalid { color: #f39c12; font-size: 12px; }
  .side-by-side { display: flex; gap: 1rem; }
  .panel { flex: 1; min-width: 0; }
  pre { background: #f7f9fa; padding: 6px; overflow-x: auto; font-size: 12px; }
</style>
</head>
<body>
<h1>${escapeHtml(meta.labName)} plagiarism report</h1>
<p>Generated ${generatedAt}. Filter: ${describeFilter(report.filter)}.${meta.compiledSources ? " C sources compared as compiled assembly." : ""}</p>
<ul class="summary">
  <li>Submissions: ${summary.submissions} (${summary.invalidSubmissions} invalid)</li>
  <li>Pairs compared: ${summary.pairsCompared}</li>
  <li>Suspicious pairs: ${summary.candidates}</li>
  <li>Plagiarized: ${summary.plagiarized}</li>
  <li>Invalid-submission verdicts: ${summary.invalidVerdicts}</li>
  <li>Not plagiarized: ${summary.notPlagiarized}</li>
</ul>
<h2>Plagiarized students</h2>
${roster.length === 0 ? "<p>None.</p>" : `<table>
<tr><th>Student</th><th>Paired with</th></tr>
${rosterRows}
</table>`}
<h2>Invalid submissions</h2>
${report.invalidSubmissions.length === 0 ? "<p>None.</p>" : `<table>
<tr><th>Student</th><th>Reason</th></tr>
${invalidRows}
</table>`}
<h2>Suspicious pairs</h2>
${report.verdicts.length === 0 ? "<p>No suspicious pairs.</p>" : `<table>
<tr><th>#</th><th>Student A</th><th>Student B</th><th>Source LCS</th><th>Source edit</th><th>Source aggregate</th><th>Hex LCS</th><th>Hex edit</th><th>Verdict</th><th>Reasoning</th></tr>
${rows}
</table>`}
</body>
</html>
`;
}
