import { complete, getModels, getProviders, type Api, type Model } from "@mariozechner/pi-ai";
import type { LlmConfig, ProfileConfig } from "../core/config-schema";
import { ContentGenerationError, errorMessage } from "../core/errors";
import { stripHashtags } from "../pipeline/normalizer";
import type { ContactEmail, Opportunity } from "../pipeline/types";

export interface DraftRequest {
    opportunity: Opportunity;
    contact: ContactEmail;
    profile: ProfileConfig;
    resumeText: string;
}

export interface DraftContent {
    subject: string;
    body: string;
}

export interface EmailDrafter {
    /** @throws ContentGenerationError */
    draft(request: DraftRequest): Promise<DraftContent>;
}

export const SYSTEM_PROMPT = `You are an expert career coach and professional email writer.
Your task is to write a job application email on behalf of the candidate.

Rules:
- Write a professional, concise, and personalized application email.
- The email should be 150-250 words (body only, excluding subject).
- Open with genuine interest in the specific role and company.
- Highlight 2-3 most relevant experiences from the resume that match the job.
- Show enthusiasm without being over-the-top.
- Close with a clear call to action (e.g., available for an interview).
- Do NOT use generic filler phrases like "I am writing to express my interest".
- Do NOT include the subject line in the body.
- Use a warm but professional tone.
- Sign off with the candidate's name.`;

/** Hashtags and dangling pipes from social titles don't belong in an email. */
export function cleanForEmail(text: string): string {
    return stripHashtags(text).replace(/\s*\|\s*$/, "").replace(/^\s*\|\s*/, "").trim();
}

export function buildDraftPrompt(request: DraftRequest): string {
    const { opportunity, profile } = request;
    return `
Write a job application email for the following position.

--- JOB DETAILS ---
Title: ${cleanForEmail(opportunity.title)}
Company: ${cleanForEmail(opportunity.company)}
Location: ${opportunity.location || "Not specified"}
Description:
${opportunity.description.substring(0, 3000) || "No description available"}

--- CANDIDATE RESUME ---
${request.resumeText.substring(0, 4000) || "No resume provided"}

--- CANDIDATE INFO ---
Name: ${profile.name}
Email: ${profile.email}
Phone: ${profile.phone}

Please respond in EXACTLY this format:

SUBJECT: <email subject line>

BODY:
<email body>
`;
}

/**
 * Split a `SUBJECT: ... BODY: ...` reply. Either part may come back empty
 * when the model ignored the format.
 */
export function parseDraftResponse(text: string): DraftContent {
    const lines = text.trim().split("\n");
    let subject = "";
    let bodyStart = 0;

    const subjectIndex = lines.findIndex(line => line.trim().toUpperCase().startsWith("SUBJECT:"));
    if (subjectIndex !== -1) {
        subject = lines[subjectIndex].trim().slice("SUBJECT:".length).trim();
        bodyStart = subjectIndex + 1;
    }

    let rest = lines.slice(bodyStart);
    const bodyIndex = rest.findIndex(line => line.trim().toUpperCase().startsWith("BODY:"));
    if (bodyIndex !== -1) {
        const inline = rest[bodyIndex].trim().slice("BODY:".length).trim();
        rest = inline ? [inline, ...rest.slice(bodyIndex + 1)] : rest.slice(bodyIndex + 1);
    }

    return { subject: cleanForEmail(subject), body: rest.join("\n").trim() };
}

/** Look up a model from the pi-ai registry by provider and id. */
export function resolveModel(provider: string, modelId: string): Model<Api> {
    const knownProvider = getProviders().find(candidate => candidate === provider);
    if (!knownProvider) {
        throw new ContentGenerationError(`Unknown LLM provider "${provider}"`);
    }
    const model = getModels(knownProvider).find(candidate => candidate.id === modelId);
    if (!model) {
        throw new ContentGenerationError(`Unknown model "${modelId}" for provider "${provider}"`);
    }
    return model;
}

/**
 * Drafts outreach emails with a single completion call. There is no
 * canned fallback: any failure surfaces as ContentGenerationError.
 */
export class PiAiDrafter implements EmailDrafter {
    constructor(
        private readonly config: LlmConfig,
        private readonly apiKey: string | undefined,
    ) {}

    async draft(request: DraftRequest): Promise<DraftContent> {
        const model = resolveModel(this.config.provider, this.config.model);
        if (!this.apiKey) {
            throw new ContentGenerationError(
                `No API key configured for ${this.config.provider}. Run: scout config:set services.${this.config.provider}.api_key "YOUR_KEY"`,
            );
        }

        let text: string;
        try {
            const response = await complete(model, {
                systemPrompt: SYSTEM_PROMPT,
                messages: [{ role: "user", content: buildDraftPrompt(request), timestamp: Date.now() }],
            }, {
                apiKey: this.apiKey,
                temperature: this.config.temperature,
                maxTokens: this.config.max_tokens,
            });
            if (response.stopReason === "error" || response.stopReason === "aborted") {
                throw new Error(response.errorMessage ?? `completion ${response.stopReason}`);
            }
            text = response.content
                .map(block => (block.type === "text" ? block.text : ""))
                .join("");
        } catch (err) {
            throw new ContentGenerationError(`LLM call failed: ${errorMessage(err)}`);
        }

        const content = parseDraftResponse(text);
        if (!content.subject || !content.body) {
            throw new ContentGenerationError("LLM response did not follow the SUBJECT/BODY format");
        }
        console.log(`✍️  [LLM] Drafted email for ${cleanForEmail(request.opportunity.title)} at ${cleanForEmail(request.opportunity.company)}`);
        return content;
    }
}
