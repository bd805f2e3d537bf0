import { describe, expect, it } from "vitest";
import { extractImportantText, extractLinks } from "../src/lib/extract.js";

const FORTY = "This paragraph is exactly forty chars ok";

describe("extractImportantText", () => {
  it("keeps long lines and drops scripts and short lines", () => {
    const html = `<html><head><title>T</title></head><body>
      <script>var secretScriptValue = "should never appear in output";</script>
      <p>${FORTY}</p>
      <p>Short line</p>
    </body></html>`;

    expect(extractImportantText(html)).toBe(FORTY);
  });

  it("strips navigation, footer, aside, form, strikethrough and anchors", () => {
    const html = `<html><body>
      <nav>Navigation menu entry that is very long indeed</nav>
      <aside>Sidebar content that is long enough to be kept</aside>
      <main>
        <p>Main content line that is definitely long enough.</p>
        <a href="/x">A link whose text is quite long enough to keep</a>
        <s>Struck through text that is long enough to keep</s>
      </main>
      <form><label>Form label text that is long enough to keep</label></form>
      <footer>Footer text that is also long enough to pass</footer>
      <style>.very-long-selector-name { color: red; display: block; }</style>
    </body></html>`;

    expect(extractImportantText(html)).toBe(
      "Main content line that is definitely long enough."
    );
  });

  it("requires lines longer than 30 characters", () => {
    const html = `<body><p>Thirty one characters are here</p><p>Thirty-one characters are here.</p></body>`;

    expect(extractImportantText(html)).toBe("Thirty-one characters are here.");
  });

  it("measures line length in characters, not UTF-16 units", () => {
    const short = "\u{1F600}".repeat(20);
    const long = "\u{1F600}".repeat(31);

    expect(extractImportantText(`<body><p>${short}</p><p>${long}</p></body>`)).toBe(long);
  });

  it("separates block text with newlines", () => {
    const html = `<body><h1>A heading that is comfortably over thirty</h1><p>${FORTY}</p></body>`;

    expect(extractImportantText(html)).toBe(
      `A heading that is comfortably over thirty\n${FORTY}`
    );
  });

  it("ignores comments", () => {
    const html = `<body><!-- A comment that is long enough to be a line --><p>${FORTY}</p></body>`;

    expect(extractImportantText(html)).toBe(FORTY);
  });
});

describe("extractLinks", () => {
  it("resolves, normalizes and de-dupes followable links", () => {
    const html = `<body>
      <a href="/b">b</a>
      <a href="/b#section">b again</a>
      <a href="http://other.test/x">other</a>
      <a href="mailto:someone@example.test">mail</a>
      <a href="javascript:void(0)">js</a>
      <a href="/private" rel="nofollow">private</a>
      <a href="/report" download>report</a>
      <a href="">empty</a>
      <a>no href</a>
    </body>`;

    expect(extractLinks(html, "http://example.test/a")).toEqual([
      "http://example.test/b",
      "http://other.test/x",
    ]);
  });
});
