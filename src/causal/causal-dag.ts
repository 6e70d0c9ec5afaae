import { categoryFromNodeId } from '../types/health-graph.js';
import type { EdgeType, HealthGraphEdge, NodeCategory } from '../types/health-graph.js';
import { canCause } from './causal-direction.js';

export interface DagEdge {
    target: NodeCategory;
    edgeType: EdgeType;
    weight: number;
}

export interface RankedPath {
    path: NodeCategory[];
    strength: number;
}

function sourceCategoryOf(edge: HealthGraphEdge): NodeCategory | undefined {
    return edge.sourceCategory ?? categoryFromNodeId(edge.sourceNodeId);
}

function targetCategoryOf(edge: HealthGraphEdge): NodeCategory | undefined {
    return edge.targetCategory ?? categoryFromNodeId(edge.targetNodeId);
}

/**
 * Category-level causal graph built from persisted edges.
 *
 * Edges whose categories are unknown or violate the causal order are left out
 * of the graph; `droppedEdgeCount` records how many. Parallel edges between
 * the same pair of categories collapse into one carrying the strongest weight,
 * so each category path is traced once.
 */
export class CausalDAG {
    readonly #adjacency: Map<NodeCategory, DagEdge[]> = new Map();
    readonly droppedEdgeCount: number;

    constructor(edges: readonly HealthGraphEdge[]) {
        let dropped = 0;
        for (const edge of edges) {
            const source = sourceCategoryOf(edge);
            const target = targetCategoryOf(edge);
            if (!source || !target || !canCause(source, target)) {
                dropped += 1;
                continue;
            }

            const list = this.#adjacency.get(source) ?? [];
            const existing = list.findIndex((candidate) => candidate.target === target);
            if (existing === -1) {
                list.push({ target, edgeType: edge.edgeType, weight: edge.causalStrength });
            } else if (edge.causalStrength > list[existing].weight) {
                list[existing] = { target, edgeType: edge.edgeType, weight: edge.causalStrength };
            }
            this.#adjacency.set(source, list);
        }
        this.droppedEdgeCount = dropped;
    }

    /** Every simple path from `source` to the symptom category. */
    tracePaths(source: NodeCategory): NodeCategory[][] {
        const paths: NodeCategory[][] = [];
        this.#dfs(source, 'symptom', [source], paths);
        return paths;
    }

    /** Product of edge weights along the path. Missing edges and paths shorter than 2 give 0. */
    pathStrength(path: readonly NodeCategory[]): number {
        if (path.length < 2) return 0;
        let strength = 1;
        for (let i = 0; i < path.length - 1; i += 1) {
            const edge = this.neighbors(path[i]).find((candidate) => candidate.target === path[i + 1]);
            strength *= edge?.weight ?? 0;
        }
        return strength;
    }

    /** Paths to the symptom category with their strengths, strongest first. */
    rankPaths(source: NodeCategory): RankedPath[] {
        return this.tracePaths(source)
            .map((path) => ({ path, strength: this.pathStrength(path) }))
            .sort((left, right) => right.strength - left.strength);
    }

    neighbors(category: NodeCategory): readonly DagEdge[] {
        return this.#adjacency.get(category) ?? [];
    }

    #dfs(current: NodeCategory, target: NodeCategory, currentPath: NodeCategory[], allPaths: NodeCategory[][]): void {
        if (current === target && currentPath.length > 1) {
            allPaths.push([...currentPath]);
            return;
        }

        for (const edge of this.neighbors(current)) {
            if (currentPath.includes(edge.target)) continue;
            currentPath.push(edge.target);
            this.#dfs(edge.target, target, currentPath, allPaths);
            currentPath.pop();
        }
    }
}
