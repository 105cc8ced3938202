/**
 * Triggers a browser download of an encoded image through a temporary link.
 */
import type { ExportSink } from "./types";

export class DownloadLinkSink implements ExportSink {
  private doc: Document;

  constructor(doc: Document = document) {
    this.doc = doc;
  }

  exportImage(dataUrl: string, fileName: string) {
    const link = this.doc.createElement("a");
    link.href = dataUrl;
    link.download = fileName;
    link.style.display = "none";
    this.doc.body.appendChild(link);
    link.click();
    link.remove();
  }
}
