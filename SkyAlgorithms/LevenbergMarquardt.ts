// Levenberg-Marquardt minimization of a sum of squared residuals.
// Marquardt diagonal scaling, Nielsen damping update.

export type LeastSquaresProblem = {
    residuals: (p: number[])=>number[];
    // One row per residual, one column per parameter
    jacobian: (p: number[])=>number[][];
}

export type SolverOptions = {
    ftol: number;
    xtol: number;
    maxEvaluations?: number;
}

export type SolverOutcome = {
    converged: true;
    parameters: number[];
    cost: number;
    evaluations: number;
    iterations: number;
} | {
    converged: false;
    reason: string;
    evaluations: number;
}

export const defaultSolverOptions: SolverOptions = {
    ftol: 1.49012e-8,
    xtol: 1.49012e-8,
};

const maxDamping = 1e300;

function sumSq(v: number[]) {
    let s = 0;
    for(const x of v) {
        s += x * x;
    }
    return s;
}

function norm(v: number[]) {
    return Math.sqrt(sumSq(v));
}

function allFinite(v: number[]) {
    return v.every(Number.isFinite);
}

// Solve a.x = b by gaussian elimination with partial pivoting. Null when singular.
export function solveLinear(a: number[][], b: number[]): number[]|null {
    const n = b.length;
    const m = a.map((row, i)=>[...row, b[i]]);
    for(let col = 0; col < n; ++col) {
        let pivot = col;
        for(let row = col + 1; row < n; ++row) {
            if (Math.abs(m[row][col]) > Math.abs(m[pivot][col])) {
                pivot = row;
            }
        }
        if (!(Math.abs(m[pivot][col]) > 1e-300)) {
            return null;
        }
        if (pivot !== col) {
            const tmp = m[pivot];
            m[pivot] = m[col];
            m[col] = tmp;
        }
        for(let row = col + 1; row < n; ++row) {
            const f = m[row][col] / m[col][col];
            if (f === 0) continue;
            for(let k = col; k <= n; ++k) {
                m[row][k] -= f * m[col][k];
            }
        }
    }
    const x = new Array<number>(n).fill(0);
    for(let row = n - 1; row >= 0; --row) {
        let s = m[row][n];
        for(let k = row + 1; k < n; ++k) {
            s -= m[row][k] * x[k];
        }
        x[row] = s / m[row][row];
    }
    return allFinite(x) ? x : null;
}

function normalEquations(jac: number[][], r: number[]) {
    const n = jac.length ? jac[0].length : 0;
    const a: number[][] = [];
    const g = new Array<number>(n).fill(0);
    for(let i = 0; i < n; ++i) {
        a.push(new Array<number>(n).fill(0));
    }
    for(let k = 0; k < jac.length; ++k) {
        const row = jac[k];
        for(let i = 0; i < n; ++i) {
            g[i] += row[i] * r[k];
            for(let j = i; j < n; ++j) {
                a[i][j] += row[i] * row[j];
            }
        }
    }
    for(let i = 0; i < n; ++i) {
        for(let j = 0; j < i; ++j) {
            a[i][j] = a[j][i];
        }
    }
    return {a, g};
}

export function minimize(problem: LeastSquaresProblem, initial: number[], options: SolverOptions = defaultSolverOptions): SolverOutcome {
    const n = initial.length;
    const maxEvaluations = options.maxEvaluations ?? 200 * (n + 1);

    let p = [...initial];
    let r = problem.residuals(p);
    let evaluations = 1;
    if (!allFinite(r)) {
        return {converged: false, reason: "non finite residuals at initial guess", evaluations};
    }
    let cost = 0.5 * sumSq(r);
    let jac = problem.jacobian(p);
    let {a, g} = normalEquations(jac, r);
    if (!allFinite(g)) {
        return {converged: false, reason: "non finite jacobian at initial guess", evaluations};
    }

    let scale = a.map((row, i)=>Math.max(row[i], 1e-12));
    let mu = 1e-3;
    let nu = 2;
    let iterations = 0;

    while(evaluations < maxEvaluations) {
        if (cost === 0 || g.every(v=>v === 0)) {
            return {converged: true, parameters: p, cost, evaluations, iterations};
        }
        iterations++;

        const damped = a.map((row, i)=>row.map((v, j)=>(i === j ? v + mu * scale[i] : v)));
        const h = solveLinear(damped, g.map(v=>-v));
        if (h === null) {
            mu *= nu;
            nu *= 2;
            if (mu > maxDamping) {
                return {converged: false, reason: "singular normal matrix", evaluations};
            }
            continue;
        }

        if (norm(h) <= options.xtol * (norm(p) + options.xtol)) {
            return {converged: true, parameters: p, cost, evaluations, iterations};
        }

        const candidate = p.map((v, i)=>v + h[i]);
        const rCandidate = problem.residuals(candidate);
        evaluations++;

        let predicted = 0;
        for(let i = 0; i < n; ++i) {
            predicted += h[i] * (mu * scale[i] * h[i] - g[i]);
        }
        predicted *= 0.5;

        const costCandidate = allFinite(rCandidate) ? 0.5 * sumSq(rCandidate) : Infinity;
        const actual = cost - costCandidate;
        const rho = predicted > 0 ? actual / predicted : -1;

        if (rho > 0 && Number.isFinite(costCandidate)) {
            const previousCost = cost;
            p = candidate;
            r = rCandidate;
            cost = costCandidate;
            jac = problem.jacobian(p);
            ({a, g} = normalEquations(jac, r));
            if (!allFinite(g)) {
                return {converged: false, reason: "non finite jacobian", evaluations};
            }
            scale = a.map((row, i)=>Math.max(row[i], scale[i]));
            mu *= Math.max(1 / 3, 1 - Math.pow(2 * rho - 1, 3));
            nu = 2;
            if (actual <= options.ftol * previousCost && predicted <= options.ftol * previousCost) {
                return {converged: true, parameters: p, cost, evaluations, iterations};
            }
        } else {
            mu *= nu;
            nu *= 2;
            if (mu > maxDamping) {
                return {converged: false, reason: "damping overflow", evaluations};
            }
        }
    }
    return {converged: false, reason: `no convergence after ${evaluations} evaluations`, evaluations};
}
