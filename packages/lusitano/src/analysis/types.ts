export type PrimitiveName = "inteiro" | "real" | "texto" | "logico" | "vazio";

export interface Signature {
    params: Type[];
    returnType: Type;
}

export type Type =
    | { kind: "primitive", name: PrimitiveName }
    | { kind: "function", signatures: Signature[] } // user functions have one, built-ins may overload
    | { kind: "error" }; // sentinel for expressions that already failed to type

export const IntType: Type = { kind: "primitive", name: "inteiro" };
export const RealType: Type = { kind: "primitive", name: "real" };
export const TextType: Type = { kind: "primitive", name: "texto" };
export const BoolType: Type = { kind: "primitive", name: "logico" };
export const VoidType: Type = { kind: "primitive", name: "vazio" };
export const ErrorType: Type = { kind: "error" };

const PRIMITIVES: Readonly<Record<PrimitiveName, Type>> = Object.freeze({
    inteiro: IntType,
    real: RealType,
    texto: TextType,
    logico: BoolType,
    vazio: VoidType,
});

export function primitive(name: PrimitiveName): Type {
    return PRIMITIVES[name];
}

export function isPrimitive(t: Type, name: PrimitiveName): boolean {
    return t.kind === "primitive" && t.name === name;
}

export function isNumeric(t: Type): boolean {
    return isPrimitive(t, "inteiro") || isPrimitive(t, "real");
}

export function isError(t: Type): boolean {
    return t.kind === "error";
}

/** Exact match. The error sentinel matches anything so one fault is reported once. */
export function typesEqual(a: Type, b: Type): boolean {
    if (a.kind === "error" || b.kind === "error") return true;
    if (a.kind === "primitive" && b.kind === "primitive") {
        return a.name === b.name;
    }
    if (a.kind === "function" && b.kind === "function") {
        return a.signatures.length === b.signatures.length &&
            a.signatures.every((s, i) => signaturesEqual(s, b.signatures[i]));
    }
    return false;
}

function signaturesEqual(a: Signature, b: Signature): boolean {
    return a.params.length === b.params.length &&
        a.params.every((p, i) => typesEqual(p, b.params[i])) &&
        typesEqual(a.returnType, b.returnType);
}

export function signatureToString(s: Signature): string {
    const params = s.params.map(typeToString).join(", ");
    return `(${params}): ${typeToString(s.returnType)}`;
}

export function typeToString(t: Type): string {
    switch (t.kind) {
        case "primitive":
            return t.name;
        case "function":
            return t.signatures.map(s => `funcao${signatureToString(s)}`).join(" | ");
        case "error":
            return "?";
    }
}
