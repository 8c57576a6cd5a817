import {
    isLiteral,
    parseClosureParams,
    readClosureHead,
    splitTopLevel,
    stripBraces,
    toPascalCase
} from "../../analysis/SourceText.js";

describe("SourceText helpers", () => {
    it("should split only at the top level", () => {
        expect(splitTopLevel("a: Vec<(i32, u8)>, b: impl Fn(i32) -> bool, c: &str"))
            .toEqual(["a: Vec<(i32, u8)>", "b: impl Fn(i32) -> bool", "c: &str"]);
    });

    it("should not split inside strings", () => {
        expect(splitTopLevel('"a, b", c')).toEqual(['"a, b"', "c"]);
    });

    it("should collect closure parameter names", () => {
        expect(parseClosureParams("ev")).toEqual(["ev"]);
        expect(parseClosureParams("(a, b): (i32, i32), mut c")).toEqual(["a", "b", "c"]);
        expect(parseClosureParams("_")).toEqual([]);
        expect(parseClosureParams("Some(x): Option<u8>")).toEqual(["x"]);
    });

    it("should read closure heads", () => {
        expect(readClosureHead("move |ev| set_name.set(ev)")).toEqual({ isMove: true, head: "|ev|", params: ["ev"] });
        expect(readClosureHead("{ || count.get() }")).toEqual({ isMove: false, head: "||", params: [] });
        expect(readClosureHead("count.get()")).toBeNull();
    });

    it("should strip one level of braces", () => {
        expect(stripBraces(" {count.get()} ")).toBe("count.get()");
        expect(stripBraces("count")).toBe("count");
    });

    it("should recognise literals", () => {
        expect(isLiteral('"text"')).toBe(true);
        expect(isLiteral('{"text"}')).toBe(true);
        expect(isLiteral("42")).toBe(true);
        expect(isLiteral("false")).toBe(true);
        expect(isLiteral("name")).toBe(false);
        expect(isLiteral("move || name.get()")).toBe(false);
        expect(isLiteral("-1")).toBe(true);
        expect(isLiteral("'c'")).toBe(true);
        expect(isLiteral('b"bytes"')).toBe(true);
        expect(isLiteral('"<b>".to_string() + &user + "</b>"')).toBe(false);
        expect(isLiteral('"a" "b"')).toBe(false);
        expect(isLiteral("")).toBe(false);
    });

    it("should convert snake case to PascalCase", () => {
        expect(toPascalCase("counter_button")).toBe("CounterButton");
        expect(toPascalCase("myButton")).toBe("MyButton");
    });
});
