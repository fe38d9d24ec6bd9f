import { execFile } from "child_process";
import { existsSync, readFileSync } from "fs";
import { extname } from "path";
import { promisify } from "util";
import type { ConfigManager } from "../core/config";
import { errorMessage } from "../core/errors";

const execFileAsync = promisify(execFile);

export const RESUME_TEXT_KEY = "profile.resume_text";

export class ResumeService {
  constructor(private readonly config: ConfigManager) {}

  /**
   * Extracts text from a PDF using the pdftotext CLI (poppler).
   */
  async extractPdfText(path: string): Promise<string> {
    let stdout: string;
    try {
      ({ stdout } = await execFileAsync("pdftotext", ["-layout", path, "-"], { maxBuffer: 10 * 1024 * 1024 }));
    } catch (error) {
      throw new Error(`Failed to extract text from PDF: ${errorMessage(error)}`);
    }
    if (stdout.trim().length === 0) {
      console.warn("⚠️ [Resume] Extracted text is empty. PDF might be a scanned image.");
    }
    return stdout;
  }

  /**
   * Read resume text from a PDF or plain-text file. A PDF that cannot be
   * read falls back to a `.txt` file with the same name.
   */
  async readResume(path: string): Promise<string> {
    if (!existsSync(path)) {
      throw new Error(`Resume not found: ${path}`);
    }
    if (extname(path).toLowerCase() !== ".pdf") {
      return readFileSync(path, "utf-8");
    }

    try {
      return await this.extractPdfText(path);
    } catch (error) {
      const txtPath = path.replace(/\.pdf$/i, ".txt");
      if (!existsSync(txtPath)) throw error;
      console.warn(`⚠️ [Resume] ${errorMessage(error)}; using ${txtPath}`);
      return readFileSync(txtPath, "utf-8");
    }
  }

  async importResume(path: string): Promise<number> {
    const text = (await this.readResume(path)).trim();
    if (!text) {
      throw new Error(`No text found in ${path}`);
    }
    await this.config.set(RESUME_TEXT_KEY, text, "profile");
    console.log(`✅ [Resume] Imported ${text.length} characters from ${path}`);
    return text.length;
  }

  /** Stored resume text, else whatever the configured file yields, else "". */
  async getResumeText(fallbackPath?: string): Promise<string> {
    const stored = await this.config.get<string>(RESUME_TEXT_KEY);
    if (stored) return stored;
    if (!fallbackPath || !existsSync(fallbackPath)) return "";
    try {
      return await this.readResume(fallbackPath);
    } catch (error) {
      console.warn(`⚠️ [Resume] ${errorMessage(error)}`);
      return "";
    }
  }
}
