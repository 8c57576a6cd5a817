import * as fs from "fs";
import * as path from "path";
import { z } from "zod";
import { createLogger } from "../utils/StructuredLogger.js";

export interface SectionInfo {
    title: string;
    path: string;
    use_cases: string;
}

export interface DocumentationSection extends SectionInfo {
    content: string;
}

const SectionIndexSchema = z.array(z.object({
    title: z.string().min(1),
    path: z.string().regex(/^[a-z0-9-]+$/, "section paths are lowercase slugs"),
    use_cases: z.string()
}));

export const SECTION_INDEX_FILE = "sections.json";

const logger = createLogger("DocumentationRegistry");

/**
 * Static Leptos documentation: metadata from `sections.json`, bodies from
 * `<path>.md` beside it. Bodies are read on first request and kept.
 */
export class DocumentationRegistry {
    private sections?: SectionInfo[];
    private readonly contentCache = new Map<string, string>();

    constructor(private readonly docsDir: string) {}

    public listSections(): SectionInfo[] {
        if (!this.sections) {
            const indexPath = path.join(this.docsDir, SECTION_INDEX_FILE);
            const raw: unknown = JSON.parse(fs.readFileSync(indexPath, "utf-8"));
            this.sections = SectionIndexSchema.parse(raw);
            logger.debug("section index loaded", { docsDir: this.docsDir, sections: this.sections.length });
        }
        return this.sections;
    }

    public getSectionPaths(): string[] {
        return this.listSections().map(section => section.path);
    }

    /**
     * First section whose path or title contains the query, case-insensitively.
     */
    public findSection(query: string): SectionInfo | undefined {
        const needle = query.trim().toLowerCase();
        if (needle.length === 0) return undefined;
        return this.listSections().find(section =>
            section.path.toLowerCase().includes(needle) || section.title.toLowerCase().includes(needle));
    }

    public getSection(query: string): DocumentationSection | undefined {
        const section = this.findSection(query);
        if (!section) return undefined;
        return { ...section, content: this.readContent(section.path) };
    }

    private readContent(sectionPath: string): string {
        const cached = this.contentCache.get(sectionPath);
        if (cached !== undefined) return cached;
        const content = fs.readFileSync(path.join(this.docsDir, `${sectionPath}.md`), "utf-8").trim();
        this.contentCache.set(sectionPath, content);
        return content;
    }
}

export function renderSectionList(sections: readonly SectionInfo[]): string {
    return sections
        .map(section => `* title: ${section.title}, use_cases: ${section.use_cases}, path: ${section.path}`)
        .join("\n");
}

export function renderSection(section: DocumentationSection): string {
    return `# ${section.title}\n\n${section.content}`;
}

export function sectionNotFoundMessage(query: string): string {
    return `Section '${query}' not found. Use list-sections to see available sections.`;
}
