import { describe, test, expect } from "vitest";

import { UNDEFINED_VALUE_REFERENCE, getCausality, getEnumValue, getName, getString } from "../src/Accessors";
import { NodeArena, isListNode } from "../src/Ast";
import { ModelDescriptionParser, parse } from "../src/ModelDescriptionParser";
import { att } from "../src/Vocabulary";
import { collectDiagnostics, defined, fixturePath } from "./helpers";

function parseVehicle(chunkSize?: number) {
  const diagnostics = collectDiagnostics();
  const parser = new ModelDescriptionParser({ diagnostics, chunkSize, env: {} });
  const md = parser.parseFile(fixturePath("vehicle.xml"));
  return { diagnostics, parser, md: defined(md) };
}

describe("ModelDescriptionParser", () => {
  test("parses every block of a complete document", () => {
    const { md, diagnostics } = parseVehicle();
    expect(md.modelIdentifier).toBe("vehicle");
    expect(md.numberOfContinuousStates).toBe(2);
    expect(md.numberOfEventIndicators).toBe(0);
    expect(md.variableNamingConvention).toBe("structured");

    const root = md.root;
    const units = defined(root.unitDefinitions);
    expect(units.map((u) => getString(u, att("unit")))).toEqual(["m/s", "m"]);
    expect(defined(units[0].list).map((d) => d.kind)).toEqual(["DisplayUnitDefinition"]);
    expect(defined(root.typeDefinitions).map((t) => getName(t))).toEqual(["Speed", "Gear"]);
    expect(defined(root.defaultExperiment).kind).toBe("DefaultExperiment");
    const tools = defined(root.vendorAnnotations);
    expect(tools.map((t) => getName(t))).toEqual(["Sketch"]);
    expect(defined(tools[0].list).map((a) => getString(a, att("value")))).toEqual(["blue"]);
    expect(md.variables.map((sv) => getName(sv))).toEqual(["minusV", "v", "throttle", "gear", "running"]);

    const cs = defined(root.coSimulation);
    expect(cs.kind).toBe("CoSimulation_Tool");
    expect(getString(defined(cs.capabilities), att("maxOutputDerivativeOrder"))).toBe("1");
    expect(defined(defined(cs.model).list).map((f) => getString(f, att("file")))).toEqual(["fmu://resources/config.txt"]);

    expect(diagnostics.of("info")).toEqual([`parse ${fixturePath("vehicle.xml")}`]);
    expect(diagnostics.of("error")).toEqual([]);
    expect(diagnostics.of("fatal")).toEqual([]);
  });

  test("stores the text of dependency names", () => {
    const { md } = parseVehicle();
    const v = defined(md.getVariableByName("v"));
    expect(defined(v.directDependencies).map((n) => getString(n, att("input")))).toEqual(["throttle"]);
  });

  test("inherits a variable's unit from its declared type", () => {
    const { md } = parseVehicle();
    const v = defined(md.getVariableByName("v"));
    expect(getString(defined(v.typeSpec), att("unit"))).toBeUndefined();
    expect(md.getVariableAttribute(v, "unit")).toBe("m/s");
    expect(md.getVariableAttribute(v, "min")).toBeUndefined();
    expect(md.getVariableAttributeDouble(v, "nominal")).toEqual({ value: 10, status: "defined" });

    const throttle = defined(md.getVariableByName("throttle"));
    expect(md.getVariableAttribute(throttle, "min")).toBe("0");
    expect(md.getVariableAttribute(throttle, "unit")).toBeUndefined();
  });

  test("finds variables by value reference and base type", () => {
    const { md } = parseVehicle();
    expect(md.getVariable(0, "Real")?.attributes[0].value).toBe("minusV");
    expect(md.getNonAliasVariable(0, "Real")?.attributes[0].value).toBe("v");
    expect(md.getVariable(0, "Integer")?.attributes[0].value).toBe("gear");
    expect(md.getVariable(0, "Boolean")?.attributes[0].value).toBe("running");
    expect(md.getVariable(9, "Real")).toBeUndefined();
    expect(md.getVariable(UNDEFINED_VALUE_REFERENCE, "Real")).toBeUndefined();
    expect(md.getVariableByName("nope")).toBeUndefined();
  });

  test("resolves descriptions, nominals and declared types", () => {
    const { md } = parseVehicle();
    expect(md.getDescription(defined(md.getVariableByName("v")))).toBe("Vehicle speed");
    expect(md.getDescription(defined(md.getVariableByName("throttle")))).toBe("Pedal position");
    expect(md.getDescription(defined(md.getVariableByName("running")))).toBeUndefined();
    expect(md.getNominal(0)).toBe(10);
    expect(md.getNominal(1)).toBe(1);
    expect(md.getVariableAttributeString(1, "Real", "start")).toBe("0.5");
    const gear = defined(md.getDeclaredType("Gear"));
    expect(md.getDeclaredType("Gear")).toBe(gear);
    const spec = defined(gear.typeSpec);
    if (!isListNode(spec)) throw new Error("expected an enumeration list");
    expect(defined(spec.list).map((item) => getName(item))).toEqual(["low", "high"]);
    expect(md.getDeclaredType("Missing")).toBeUndefined();
  });

  test("attribute names are shared across nodes", () => {
    const { md } = parseVehicle();
    const [first, second] = md.variables;
    const type = defined(md.root.typeDefinitions)[0];
    expect(first.attributes[0].name).toBe(second.attributes[0].name);
    expect(first.attributes[0].name).toBe(type.attributes[0].name);
    expect(type.attributes[0].name).toBe(att("name"));
  });

  test("reading in small chunks gives the same tree", () => {
    const whole = parseVehicle();
    const chunked = parseVehicle(7);
    expect(chunked.md.format()).toBe(whole.md.format());
  });

  test("free releases every node once", () => {
    const { md, parser } = parseVehicle();
    expect(parser.arena.liveCount).toBeGreaterThan(0);
    md.free();
    expect(md.isReleased).toBe(true);
    expect(parser.arena.liveCount).toBe(0);
    expect(parser.arena.invalidReleaseCount).toBe(0);
    expect(() => md.free()).toThrow("Model description has already been released");
    expect(() => md.root).toThrow("Model description has already been released");
  });

  test("fails validation on an unresolved declared type", () => {
    const diagnostics = collectDiagnostics();
    const arena = new NodeArena();
    const parser = new ModelDescriptionParser({ diagnostics, arena, env: {} });
    expect(parser.parseFile(fixturePath("missing-declared-type.xml"))).toBeNull();
    expect(parser.lastError).toBeNull();
    expect(diagnostics.of("warning")).toEqual(["Declared type Foo of variable x not found in modelDescription.xml"]);
    expect(diagnostics.of("error")).toEqual(["Found 1 error(s) in modelDescription.xml"]);
    expect(arena.allocatedCount).toBeGreaterThan(0);
    expect(arena.liveCount).toBe(0);
  });

  test("reports a file that cannot be opened", () => {
    const diagnostics = collectDiagnostics();
    const missing = fixturePath("does-not-exist.xml");
    const parser = new ModelDescriptionParser({ diagnostics, env: {} });
    expect(parser.parseFile(missing)).toBeNull();
    expect(parser.lastError?.kind).toBe("io");
    expect(diagnostics.of("error")).toEqual([`Cannot open file '${missing}'`]);
  });

  test("parse is a one-shot shortcut", () => {
    const md = parse(fixturePath("vehicle.xml"), { diagnostics: collectDiagnostics(), env: {} });
    expect(md?.modelIdentifier).toBe("vehicle");
  });
});

describe("parseString", () => {
  function parseWith(xml: string) {
    const diagnostics = collectDiagnostics();
    const arena = new NodeArena();
    const parser = new ModelDescriptionParser({ diagnostics, arena, env: {} });
    const md = parser.parseString(xml);
    return { md, diagnostics, arena, parser };
  }

  test("parses the minimal document", () => {
    const { md } = parseWith('<fmiModelDescription modelIdentifier="m"/>');
    expect(defined(md).modelIdentifier).toBe("m");
    expect(defined(md).variables).toEqual([]);
  });

  test("an unknown element fails with its line", () => {
    const xml = [
      "<fmiModelDescription>",
      "  <ModelVariables>",
      "    <Bogus/>",
      "  </ModelVariables>",
      "</fmiModelDescription>",
    ].join("\n");
    const { md, diagnostics, arena, parser } = parseWith(xml);
    expect(md).toBeNull();
    expect(parser.lastError).toEqual({ kind: "unknown-element", message: "Illegal element Bogus", line: 3 });
    expect(diagnostics.of("fatal")).toEqual(["Illegal element Bogus (<string>, line 3)"]);
    expect(arena.liveCount).toBe(0);
  });

  test("an unknown attribute fails the parse", () => {
    const { md, parser, arena } = parseWith('<fmiModelDescription><ModelVariables><ScalarVariable name="x" size="2"><Real/></ScalarVariable></ModelVariables></fmiModelDescription>');
    expect(md).toBeNull();
    expect(parser.lastError?.kind).toBe("unknown-attribute");
    expect(parser.lastError?.message).toBe("Illegal attribute size");
    expect(arena.liveCount).toBe(0);
  });

  test("an unknown enum literal fails the parse", () => {
    const { md, parser } = parseWith('<fmiModelDescription variableNamingConvention="nested"/>');
    expect(md).toBeNull();
    expect(parser.lastError?.message).toBe("Illegal enum value nested for attribute variableNamingConvention");
  });

  test("malformed markup is a syntax error", () => {
    const { md, parser, diagnostics, arena } = parseWith("<fmiModelDescription></FMIModelDescription>");
    expect(md).toBeNull();
    expect(parser.lastError?.kind).toBe("syntax");
    expect(diagnostics.of("error")[0]).toMatch(/^Parse error in file <string> at line \d+:\n/);
    expect(arena.liveCount).toBe(0);
  });

  describe("markup that is not well-formed fails", () => {
    const cases: Array<[string, string]> = [
      ["an unclosed child", "<fmiModelDescription><ModelVariables></fmiModelDescription>"],
      ["a missing root end tag", '<fmiModelDescription modelIdentifier="m">'],
      ["an unquoted attribute value", "<fmiModelDescription modelIdentifier=m/>"],
    ];

    for (const [name, xml] of cases) {
      test(name, () => {
        const { md, parser, diagnostics, arena } = parseWith(xml);
        expect(md).toBeNull();
        expect(parser.lastError?.kind).toBe("syntax");
        expect(diagnostics.of("warning")).toEqual([]);
        expect(diagnostics.of("error")).toHaveLength(1);
        expect(arena.allocatedCount).toBe(0);
      });
    }
  });

  test("a variable without causality resolves to internal", () => {
    const { md } = parseWith('<fmiModelDescription><ModelVariables><ScalarVariable name="x" valueReference="0"><Real/></ScalarVariable></ModelVariables></fmiModelDescription>');
    const x = defined(defined(md).getVariableByName("x"));
    expect(getEnumValue(x, att("causality"))).toEqual({ value: "internal", status: "missing" });
    expect(getCausality(x)).toBe("internal");
    expect(defined(md).getNonAliasVariable(0, "Real")).toBe(x);
  });

  test("each parse runs independently", () => {
    const diagnostics = collectDiagnostics();
    const parser = new ModelDescriptionParser({ diagnostics, env: {} });
    expect(parser.parseString("<fmiModelDescription><Bogus/></fmiModelDescription>")).toBeNull();
    const md = parser.parseString('<fmiModelDescription modelIdentifier="after"/>');
    expect(md?.modelIdentifier).toBe("after");
    expect(parser.lastError).toBeNull();
  });
});
