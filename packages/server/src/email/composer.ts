import type { Briefing, DeepDive, ProcessedArticle, UserProfile } from "@daybrief/shared";

export interface EmailDocument {
  subject: string;
  html: string;
  text: string;
}

/** "October 19, 2026" */
export function formatBriefingDate(date: Date): string {
  return date.toLocaleDateString("en-US", {
    month: "long",
    day: "numeric",
    year: "numeric",
    timeZone: "UTC",
  });
}

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

function paragraphs(text: string): string[] {
  return text
    .split(/\n\s*\n/)
    .map((p) => p.trim())
    .filter((p) => p.length > 0);
}

function renderParagraphs(text: string): string {
  return paragraphs(text)
    .map((p) => `<p>${escapeHtml(p)}</p>`)
    .join("\n");
}

function renderStory(article: ProcessedArticle, position: number): string {
  const rank = article.rank ?? position + 1;
  const why = article.whySelected
    ? `\n  <p class="why">${escapeHtml(article.whySelected)}</p>`
    : "";
  return [
    `<div class="story">`,
    `  <h3><span class="rank">${rank}.</span> <a href="${escapeHtml(article.url)}">${escapeHtml(article.title)}</a></h3>`,
    `  <p class="meta">${escapeHtml(article.source)}</p>`,
    `  <p>${escapeHtml(article.summary)}</p>${why}`,
    `</div>`,
  ].join("\n");
}

function renderDeepDive(dive: DeepDive): string {
  const related = dive.relatedArticles.length
    ? `\n  <ul class="related">\n${dive.relatedArticles
        .map((url) => `    <li><a href="${escapeHtml(url)}">${escapeHtml(url)}</a></li>`)
        .join("\n")}\n  </ul>`
    : "";
  return [
    `<div class="deep-dive">`,
    `  <h3>${escapeHtml(dive.topic)}</h3>`,
    `  <p class="hook"><em>${escapeHtml(dive.hook)}</em></p>`,
    `  ${renderParagraphs(dive.analysis)}${related}`,
    `</div>`,
  ].join("\n");
}

function renderText(
  user: UserProfile,
  briefing: Briefing,
  dateLabel: string,
): string {
  const lines: string[] = [];
  lines.push(`Your daily briefing - ${dateLabel}`);
  lines.push(`Hi ${user.name ?? "there"},`);
  lines.push("");
  lines.push("THE LANDSCAPE");
  lines.push(...paragraphs(briefing.landscape.content).flatMap((p) => [p, ""]));
  lines.push("YOUR TOP 5");
  briefing.top5.forEach((a, i) => {
    lines.push(`${a.rank ?? i + 1}. ${a.title}`);
    lines.push(`   ${a.source} | ${a.url}`);
    if (a.whySelected) lines.push(`   ${a.whySelected}`);
  });
  lines.push("");
  lines.push("DEEP DIVES");
  for (const d of briefing.deepDives) {
    lines.push(d.topic);
    lines.push(d.hook);
    lines.push(...paragraphs(d.analysis));
    for (const url of d.relatedArticles) lines.push(`- ${url}`);
    lines.push("");
  }
  lines.push(
    `${briefing.articlesAnalyzed} articles analyzed from ${briefing.sourcesCount} sources.`,
  );
  return lines.join("\n");
}

/**
 * Render a briefing into an email document. Pure: the template source is
 * passed in and every interpolated value is HTML-escaped. Placeholders are
 * written `{{name}}`; unknown placeholders render empty.
 */
export function composeBriefingEmail(
  template: string,
  user: UserProfile,
  briefing: Briefing,
  date: Date,
): EmailDocument {
  const dateLabel = formatBriefingDate(date);
  const subject = `Your daily briefing: ${dateLabel}`;

  const values: Record<string, string> = {
    subject: escapeHtml(subject),
    name: escapeHtml(user.name ?? "there"),
    date: escapeHtml(dateLabel),
    topics: escapeHtml(user.topics.join(", ")),
    landscape:
      renderParagraphs(briefing.landscape.content) ||
      "<p>No landscape is available today.</p>",
    top5: briefing.top5.map(renderStory).join("\n"),
    deep_dives: briefing.deepDives.map(renderDeepDive).join("\n"),
    articles_analyzed: String(briefing.articlesAnalyzed),
    sources_count: String(briefing.sourcesCount),
  };

  const html = template.replace(
    /\{\{\s*(\w+)\s*\}\}/g,
    (_match, key: string) => values[key] ?? "",
  );

  return { subject, html, text: renderText(user, briefing, dateLabel) };
}
