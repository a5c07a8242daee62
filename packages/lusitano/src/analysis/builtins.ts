import { IntType, RealType, TextType, BoolType } from "./types";
import type { Signature, Type } from "./types";

export interface Builtin {
    name: string;
    signatures: Signature[];
}

function unary(params: Type[], returnType: Type): Signature[] {
    return params.map(p => ({ params: [p], returnType }));
}

export const BUILTINS: readonly Builtin[] = Object.freeze([
    { name: "paraInteiro", signatures: unary([TextType, RealType, IntType], IntType) },
    { name: "paraReal", signatures: unary([TextType, IntType, RealType], RealType) },
    { name: "paraTexto", signatures: unary([IntType, RealType, TextType, BoolType], TextType) },
    { name: "raiz", signatures: unary([IntType, RealType], RealType) },
    {
        name: "absoluto",
        signatures: [
            { params: [IntType], returnType: IntType },
            { params: [RealType], returnType: RealType },
        ],
    },
    { name: "arredonda", signatures: unary([RealType, IntType], IntType) },
    { name: "tamanho", signatures: unary([TextType], IntType) },
]);

