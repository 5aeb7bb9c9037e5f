export interface PdfTextExtractor {
  extract(data: Uint8Array): Promise<string>;
}

/** Page text through pdfjs-dist's legacy build, which runs on Node.js 20. */
export class PdfjsTextExtractor implements PdfTextExtractor {
  async extract(data: Uint8Array): Promise<string> {
    const pdfjs = await import("pdfjs-dist/legacy/build/pdf.mjs");
    // getDocument takes ownership of the buffer it is given
    const doc = await pdfjs.getDocument({ data: new Uint8Array(data), isEvalSupported: false, useSystemFonts: true })
      .promise;
    try {
      const pages: string[] = [];
      for (let n = 1; n <= doc.numPages; n++) {
        const page = await doc.getPage(n);
        const content = await page.getTextContent();
        let text = "";
        for (const item of content.items) {
          if (!("str" in item)) continue;
          text += item.str + (item.hasEOL ? "\n" : " ");
        }
        pages.push(text.trim());
      }
      return pages.join("\n");
    } finally {
      await doc.destroy();
    }
  }
}
