import type { Type } from "./types";
import { InternalCompilerError } from "../errors";

export type SymbolCategory = "variable" | "constant" | "function" | "parameter";

export interface Symbol {
    name: string;
    type: Type;
    category: SymbolCategory;
    scope: number; // arena index of the declaring scope
    line: number;
    column: number;
    emitName: string; // identifier used in generated code
    builtin?: boolean;
}

export interface Scope {
    id: number;
    parent: number | null;
    frame: number; // id of the function scope (or the global scope) this scope lives in
    symbols: Map<string, Symbol>;
}

export const GLOBAL_SCOPE = 0;

/**
 * Scopes live in an arena and refer to their parent by index, so a scope
 * stays addressable (for symbols, hover, frame lookups) after it is exited.
 */
export class ScopeManager {
    private scopes: Scope[] = [];
    private current: number = GLOBAL_SCOPE;

    constructor() {
        this.scopes.push({ id: GLOBAL_SCOPE, parent: null, frame: GLOBAL_SCOPE, symbols: new Map() });
    }

    public get currentScope(): number {
        return this.current;
    }

    public get currentFrame(): number {
        return this.scopes[this.current].frame;
    }

    public enter(kind: "function" | "block"): number {
        const id = this.scopes.length;
        const frame = kind === "function" ? id : this.scopes[this.current].frame;
        this.scopes.push({ id, parent: this.current, frame, symbols: new Map() });
        this.current = id;
        return id;
    }

    public exit() {
        const parent = this.scopes[this.current].parent;
        if (parent === null) {
            throw new InternalCompilerError("attempted to exit the global scope");
        }
        this.current = parent;
    }

    /** Adds to the current scope. On a name clash returns the symbol already there and declares nothing. */
    public declare(symbol: Symbol): Symbol | undefined {
        const symbols = this.scopes[this.current].symbols;
        const existing = symbols.get(symbol.name);
        if (existing) return existing;
        symbols.set(symbol.name, symbol);
        return undefined;
    }

    public resolve(name: string): Symbol | undefined {
        for (let id: number | null = this.current; id !== null; id = this.scopes[id].parent) {
            const s = this.scopes[id].symbols.get(name);
            if (s) return s;
        }
        return undefined;
    }

    /** 1 at global scope. */
    public depth(): number {
        let depth = 0;
        for (let id: number | null = this.current; id !== null; id = this.scopes[id].parent) {
            depth++;
        }
        return depth;
    }

    public frameOf(scopeId: number): number {
        const scope = this.scopes[scopeId];
        if (!scope) {
            throw new InternalCompilerError(`unknown scope ${scopeId}`);
        }
        return scope.frame;
    }

    public isEmitNameVisible(emitName: string): boolean {
        for (let id: number | null = this.current; id !== null; id = this.scopes[id].parent) {
            for (const s of this.scopes[id].symbols.values()) {
                if (s.emitName === emitName) return true;
            }
        }
        return false;
    }

    public getScope(id: number): Scope | undefined {
        return this.scopes[id];
    }
}
