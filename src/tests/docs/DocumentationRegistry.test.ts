import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { DEFAULT_DOCS_DIR } from "../../config/ServerConfig.js";
import {
    DocumentationRegistry,
    renderSection,
    renderSectionList,
    sectionNotFoundMessage
} from "../../docs/DocumentationRegistry.js";

describe("DocumentationRegistry", () => {
    const registry = new DocumentationRegistry(DEFAULT_DOCS_DIR);

    it("should list the packaged sections in index order", () => {
        const paths = registry.getSectionPaths();
        expect(paths).toHaveLength(11);
        expect(paths[0]).toBe("getting-started");
        expect(paths).toContain("signals");
    });

    it("should have a markdown body for every section", () => {
        for (const sectionPath of registry.getSectionPaths()) {
            expect(registry.getSection(sectionPath)?.content.length).toBeGreaterThan(0);
        }
    });

    it("should match on path or title, ignoring case", () => {
        expect(registry.findSection("server")?.path).toBe("server-functions");
        expect(registry.findSection("Routing")?.path).toBe("routing");
        expect(registry.findSection("  SIGNALS ")?.path).toBe("signals");
        expect(registry.findSection("Error Handling")?.path).toBe("error-handling");
    });

    it("should find nothing for blank or unknown queries", () => {
        expect(registry.findSection("")).toBeUndefined();
        expect(registry.findSection("   ")).toBeUndefined();
        expect(registry.getSection("zzz")).toBeUndefined();
    });

    it("should return the trimmed body", () => {
        const section = registry.getSection("signals");
        expect(section?.title).toBe("Signals");
        expect(section?.content.startsWith("Signals are the basic unit of reactive state.")).toBe(true);
        expect(section?.content).toBe(section?.content.trim());
    });

    describe("with a custom directory", () => {
        let dir: string;

        beforeEach(() => {
            dir = fs.mkdtempSync(path.join(os.tmpdir(), "leptos-docs-"));
        });

        afterEach(() => {
            fs.rmSync(dir, { recursive: true, force: true });
        });

        it("should read and cache the body", () => {
            fs.writeFileSync(path.join(dir, "sections.json"), JSON.stringify([
                { title: "Intro", path: "intro", use_cases: "start" }
            ]));
            fs.writeFileSync(path.join(dir, "intro.md"), "\nHello\n\n");
            const custom = new DocumentationRegistry(dir);

            expect(custom.getSection("intro")?.content).toBe("Hello");
            fs.writeFileSync(path.join(dir, "intro.md"), "Changed");
            expect(custom.getSection("intro")?.content).toBe("Hello");
        });

        it("should reject an index with invalid paths", () => {
            fs.writeFileSync(path.join(dir, "sections.json"), JSON.stringify([
                { title: "Bad", path: "../escape", use_cases: "" }
            ]));
            expect(() => new DocumentationRegistry(dir).listSections()).toThrow("section paths are lowercase slugs");
        });
    });

    describe("rendering", () => {
        it("should list one line per section", () => {
            const text = renderSectionList(registry.listSections());
            expect(text.split("\n")[0]).toBe(
                "* title: Getting Started, use_cases: new project, setup, installation, basics, hello world, path: getting-started"
            );
            expect(text.split("\n")).toHaveLength(11);
        });

        it("should put the title above the body", () => {
            expect(renderSection({ title: "Intro", path: "intro", use_cases: "", content: "Body" })).toBe("# Intro\n\nBody");
        });

        it("should explain a missing section", () => {
            expect(sectionNotFoundMessage("zzz")).toBe("Section 'zzz' not found. Use list-sections to see available sections.");
        });
    });
});
