import { scanSource, SourceScanner } from "../../analysis/SourceScanner.js";
import { groupUnits } from "../../analysis/RuleEngine.js";

const unitsOf = (source: string) => groupUnits(scanSource(source));

describe("SourceScanner", () => {
    describe("view markup", () => {
        it("should emit the element and a text-position read", () => {
            const source = "view! { <p>{count.get()}</p> }";
            const units = scanSource(source);

            expect(units.map(unit => unit.kind)).toEqual(["markup-element", "reactive-read"]);
            expect(units[1]).toMatchObject({
                kind: "reactive-read",
                start: 12,
                text: "count.get()",
                receiver: "count",
                root: "count",
                method: "get",
                tracked: true,
                inView: true,
                deferred: false,
                position: "text",
                expression: "count.get()",
                attribute: null
            });
        });

        it("should read attribute values up to the closing slash", () => {
            const source = "view! { <input value=name.get() /> }";
            const units = scanSource(source);

            expect(units.map(unit => unit.kind)).toEqual(["reactive-read", "attribute-binding", "markup-element"]);
            expect(units[0]).toMatchObject({ position: "attribute", attribute: "value", expression: "name.get()" });
            expect(units[1]).toMatchObject({ element: "input", name: "value", value: "name.get()", start: 15 });
            expect(units[2]).toMatchObject({
                tag: "input",
                selfClosing: true,
                attributes: [{ name: "value", value: "name.get()", start: 15 }]
            });
        });

        it("should end a value at the next attribute name", () => {
            const source = 'view! { <input type="text" prop:value=name on:input=handler disabled/> }';
            const [element] = unitsOf(source)["markup-element"];

            expect(element.attributes).toEqual([
                { name: "type", value: '"text"', start: 15 },
                { name: "prop:value", value: "name", start: 27 },
                { name: "on:input", value: "handler", start: 43 },
                { name: "disabled", value: null, start: 60 }
            ]);
        });

        it("should capture event handler closures and the handles they use", () => {
            const source = 'view! { <button on:click=move |_| set_count.set(1)>"go"</button> }';
            const units = scanSource(source);

            expect(units.map(unit => unit.kind)).toEqual(["closure-body", "event-handler", "markup-element"]);
            expect(units[0]).toMatchObject({
                kind: "closure-body",
                text: "move |_| set_count.set(1)",
                head: "|_|",
                isMove: true,
                params: [],
                inView: true,
                nested: false,
                position: "event",
                handles: [{ receiver: "set_count", root: "set_count", method: "set", offset: 34 }]
            });
            expect(units[1]).toMatchObject({
                kind: "event-handler",
                element: "button",
                event: "click",
                handler: "move |_| set_count.set(1)",
                isClosure: true
            });
        });

        it("should mark closures nested in the same view expression", () => {
            const source = "view! { <p>{move || items.get().iter().map(|i| i + count.get()).sum::<i32>()}</p> }";
            const closures = unitsOf(source)["closure-body"];

            expect(closures.map(closure => [closure.head, closure.isMove, closure.nested])).toEqual([
                ["|i|", false, true],
                ["||", true, false]
            ]);
            expect(closures[0].handles.map(handle => handle.root)).toEqual(["count"]);
            expect(closures[1].handles.map(handle => handle.root)).toEqual(["items", "count"]);
        });

        it("should treat function-call syntax on a declared getter as a tracked read", () => {
            const source = "let (count, set_count) = signal(0);\nview! { <p>{count()}</p> }";
            const [read] = unitsOf(source)["reactive-read"];

            expect(read).toMatchObject({ text: "count()", method: "call", tracked: true, position: "text" });
        });

        it("should flag untracked reads as such", () => {
            const [read] = unitsOf("view! { <p>{count.get_untracked()}</p> }")["reactive-read"];
            expect(read.tracked).toBe(false);
            expect(read.method).toBe("get_untracked");
        });
    });

    describe("closures outside views", () => {
        it("should not attribute reads of a parameter to an outer handle", () => {
            const source = "let f = move |count| count.get();";
            const units = scanSource(source);

            expect(units.map(unit => unit.kind)).toEqual(["reactive-read", "closure-body"]);
            expect(units[0]).toMatchObject({ inView: false, deferred: true, position: "code" });
            expect(units[1]).toMatchObject({ params: ["count"], handles: [], inView: false, text: "move |count| count.get()" });
        });
    });

    describe("declarations", () => {
        it("should describe a component signature", () => {
            const source = [
                "#[component]",
                "pub fn TodoItem(#[prop(into)] title: Signal<String>, done: bool) -> impl IntoView {",
                "    view! { <li>{title}</li> }",
                "}"
            ].join("\n");
            const [component] = unitsOf(source)["component-decl"];

            expect(component).toMatchObject({
                name: "TodoItem",
                props: [
                    { name: "title", type: "Signal<String>" },
                    { name: "done", type: "bool" }
                ],
                attributes: ["component"],
                hasComponentAttribute: true,
                returnsView: true
            });
        });

        it("should describe a server function", () => {
            const source = '#[server(GetPosts, "/api")]\npub async fn get_posts(page: usize) -> Result<Vec<Post>, String> {\n    todo!()\n}';
            const units = unitsOf(source);

            expect(units["component-decl"]).toEqual([]);
            expect(units["server-function"]).toHaveLength(1);
            expect(units["server-function"][0]).toMatchObject({
                name: "get_posts",
                returnType: "Result<Vec<Post>, String>",
                attributes: ['server(GetPosts, "/api")']
            });
        });

        it("should describe signal declarations", () => {
            const source = [
                "let (count, set_count) = signal(0);",
                "let name = RwSignal::new(String::new());",
                "let doubled = Memo::new(move |_| count.get() * 2);",
                "let plain = leptos::prelude::signal(1);"
            ].join("\n");
            const declarations = unitsOf(source)["signal-declaration"];

            expect(declarations.map(unit => [unit.factory, unit.bindings, unit.destructured, unit.getter, unit.setter, unit.args])).toEqual([
                ["signal", ["count", "set_count"], true, "count", "set_count", "0"],
                ["RwSignal::new", ["name"], false, "name", "name", "String::new()"],
                ["Memo::new", ["doubled"], false, "doubled", null, "move |_| count.get() * 2"],
                ["signal", ["plain"], false, null, null, "1"]
            ]);
        });

        it("should split resource arguments and find fetcher reads", () => {
            const source = "let a = Resource::new(move || id.get(), |id| load(id));\nlet b = Resource::new(move || (), move |_| load(page.get()));";
            const resources = unitsOf(source)["resource-call"];

            expect(resources).toHaveLength(2);
            expect(resources[0].args.map(arg => arg.text)).toEqual(["move || id.get()", "|id| load(id)"]);
            expect(resources[0].fetcherParams).toEqual(["id"]);
            expect(resources[0].fetcherReads).toEqual([]);
            expect(resources[1].fetcherReads.map(read => `${read.receiver}.${read.method}`)).toEqual(["page.get"]);
        });

        it("should record macro invocations", () => {
            const [macro] = unitsOf('println!("{}", total);')["macro-call"];
            expect(macro).toMatchObject({ name: "println", args: '"{}", total', start: 0, text: 'println!("{}", total)' });
        });
    });

    describe("unbalanced input", () => {
        it("should stop at a mismatched closing delimiter", () => {
            const units = scanSource("fn a() { let x = (1, 2]; }");
            expect(units).toEqual([{ kind: "opaque", start: 22, end: 26, text: "]; }" }]);
        });

        it("should turn unclosed frames into one opaque tail", () => {
            const source = "view! { <p>{count.get()}</p>";
            const units = scanSource(source);

            expect(units.map(unit => unit.kind)).toEqual(["markup-element", "reactive-read", "opaque"]);
            expect(units[2]).toEqual({ kind: "opaque", start: 6, end: source.length, text: source.slice(6) });
        });

        it("should make everything opaque after a leading stray close", () => {
            const source = "} view! { <p>{count.get()}</p> }";
            expect(scanSource(source)).toEqual([{ kind: "opaque", start: 0, end: source.length, text: source }]);
        });

        it.each([
            ["unclosed destructuring lets", "let (a, b = signal(0);\n"],
            ["unclosed parameter lists", "fn f(x: i32\n"]
        ])("should stay fast on large input with %s", (_label, line) => {
            const source = line.repeat(30000);
            const startedAt = Date.now();
            const units = scanSource(source);
            const elapsed = Date.now() - startedAt;

            expect(units).toEqual([{ kind: "opaque", start: 4, end: source.length, text: source.slice(4) }]);
            expect(elapsed).toBeLessThan(3000);
        });

        it("should produce nothing for empty input", () => {
            expect(scanSource("")).toEqual([]);
        });
    });

    describe("iteration", () => {
        it("should restart from the beginning on each iteration", () => {
            const scanner = new SourceScanner("let (a, set_a) = signal(1);\nview! { <p>{a.get()}</p> }");
            const first = [...scanner];
            const second = [...scanner];

            expect(first.length).toBeGreaterThan(0);
            expect(second).toEqual(first);
        });

        it("should yield units before the whole input is consumed", () => {
            const iterator = new SourceScanner('println!("a");\nlet x = (')[Symbol.iterator]();
            const first = iterator.next();

            expect(first.done).toBe(false);
            expect(first.value).toMatchObject({ kind: "macro-call", name: "println" });
        });
    });
});
