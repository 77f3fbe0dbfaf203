import { describe, it, expect } from "vitest";
import { fileURLToPath } from "node:url";
import type { Briefing } from "@daybrief/shared";
import {
  composeBriefingEmail,
  escapeHtml,
  formatBriefingDate,
} from "../composer.js";
import { createTemplateEngine } from "../../templates.js";
import { NOW, user } from "../../__tests__/fakes.js";

const briefing: Briefing = {
  landscape: { content: "Chips are up.\n\nEnergy is <flat>." },
  top5: [
    {
      source: "Wire",
      url: "http://wire.test/1?a=1&b=2",
      title: "Fabs & foundries",
      summary: "New fab announced.",
      relevance: 0.9,
      keywords: ["fab"],
      rank: 1,
      whySelected: "You follow chips",
    },
    {
      source: "Daily",
      url: "http://daily.test/2",
      title: "Grid update",
      summary: "Grid stable.",
      relevance: 0.4,
      keywords: ["grid"],
      rank: 2,
    },
  ],
  deepDives: [
    {
      topic: "Supply chains",
      hook: "Where the bottleneck is",
      analysis: "First part.\n\nSecond part.",
      relatedArticles: ["http://wire.test/1?a=1&b=2"],
    },
  ],
  articlesAnalyzed: 7,
  sourcesCount: 3,
};

const ada = user("ada@example.com", ["chips", "energy"], "Ada <Admin>");

describe("formatBriefingDate", () => {
  it("formats in UTC", () => {
    expect(formatBriefingDate(new Date("2026-10-19T23:30:00Z"))).toBe("October 19, 2026");
  });
});

describe("escapeHtml", () => {
  it("escapes markup characters", () => {
    expect(escapeHtml(`<a href="x">'&'</a>`)).toBe(
      "&lt;a href=&quot;x&quot;&gt;&#39;&amp;&#39;&lt;/a&gt;",
    );
  });
});

describe("composeBriefingEmail", () => {
  it("fills placeholders with escaped values", () => {
    const doc = composeBriefingEmail(
      "<title>{{subject}}</title><p>{{ name }}|{{topics}}|{{articles_analyzed}}/{{sources_count}}|{{unknown}}</p>",
      ada,
      briefing,
      NOW,
    );

    expect(doc.subject).toBe("Your daily briefing: October 19, 2026");
    expect(doc.html).toBe(
      "<title>Your daily briefing: October 19, 2026</title><p>Ada &lt;Admin&gt;|chips, energy|7/3|</p>",
    );
  });

  it("renders landscape paragraphs", () => {
    const doc = composeBriefingEmail("{{landscape}}", ada, briefing, NOW);

    expect(doc.html).toBe("<p>Chips are up.</p>\n<p>Energy is &lt;flat&gt;.</p>");
  });

  it("renders a placeholder paragraph for an empty landscape", () => {
    const doc = composeBriefingEmail(
      "{{landscape}}",
      ada,
      { ...briefing, landscape: { content: "" } },
      NOW,
    );

    expect(doc.html).toBe("<p>No landscape is available today.</p>");
  });

  it("renders ranked stories with escaped links", () => {
    const doc = composeBriefingEmail("{{top5}}", ada, briefing, NOW);

    expect(doc.html).toBe(
      [
        `<div class="story">`,
        `  <h3><span class="rank">1.</span> <a href="http://wire.test/1?a=1&amp;b=2">Fabs &amp; foundries</a></h3>`,
        `  <p class="meta">Wire</p>`,
        `  <p>New fab announced.</p>`,
        `  <p class="why">You follow chips</p>`,
        `</div>`,
        `<div class="story">`,
        `  <h3><span class="rank">2.</span> <a href="http://daily.test/2">Grid update</a></h3>`,
        `  <p class="meta">Daily</p>`,
        `  <p>Grid stable.</p>`,
        `</div>`,
      ].join("\n"),
    );
  });

  it("renders deep dives with their related links", () => {
    const doc = composeBriefingEmail("{{deep_dives}}", ada, briefing, NOW);

    expect(doc.html).toBe(
      [
        `<div class="deep-dive">`,
        `  <h3>Supply chains</h3>`,
        `  <p class="hook"><em>Where the bottleneck is</em></p>`,
        `  <p>First part.</p>`,
        `<p>Second part.</p>`,
        `  <ul class="related">`,
        `    <li><a href="http://wire.test/1?a=1&amp;b=2">http://wire.test/1?a=1&amp;b=2</a></li>`,
        `  </ul>`,
        `</div>`,
      ].join("\n"),
    );
  });

  it("builds a plain-text version", () => {
    const doc = composeBriefingEmail("", user("bo@example.com", ["chips"]), briefing, NOW);

    expect(doc.text.split("\n")).toEqual([
      "Your daily briefing - October 19, 2026",
      "Hi there,",
      "",
      "THE LANDSCAPE",
      "Chips are up.",
      "",
      "Energy is <flat>.",
      "",
      "YOUR TOP 5",
      "1. Fabs & foundries",
      "   Wire | http://wire.test/1?a=1&b=2",
      "   You follow chips",
      "2. Grid update",
      "   Daily | http://daily.test/2",
      "",
      "DEEP DIVES",
      "Supply chains",
      "Where the bottleneck is",
      "First part.",
      "Second part.",
      "- http://wire.test/1?a=1&b=2",
      "",
      "7 articles analyzed from 3 sources.",
    ]);
  });

  it("fills every slot of the bundled template", () => {
    const templates = createTemplateEngine(
      fileURLToPath(new URL("../../../../../templates", import.meta.url)),
    );

    const doc = composeBriefingEmail(templates.get("briefing"), ada, briefing, NOW);

    expect(templates.names()).toEqual(["briefing"]);
    expect(doc.html).not.toMatch(/\{\{\s*\w+\s*\}\}/);
    expect(doc.html).toContain("<h1>Good morning, Ada &lt;Admin&gt;</h1>");
    expect(doc.html).toContain("October 19, 2026 &middot; 7 articles from 3 sources");
  });
});
