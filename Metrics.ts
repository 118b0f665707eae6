// Run counters, rendered in the prometheus text exposition format

export type Definition = {
    name: string;
    help?: string|undefined;
    type?: "gauge"|"untyped"|"counter"|undefined;
    value?: number;
    labels?: {[id:string]: string};
};

function formatLabels(labels: {[id:string]: string}|undefined) {
    const entries = Object.entries(labels || {});
    if (!entries.length) {
        return '';
    }
    return '{' + entries.map(([key, v])=>`${key}=${JSON.stringify(v)}`).join(',') + '}';
}

export function format(metrics: Definition[]) {
    const ret: string[] = [];
    for(const metric of metrics) {
        if (metric.help) {
            ret.push(`# HELP ${metric.name} ${metric.help}\n`);
        }
        if (metric.type) {
            ret.push(`# TYPE ${metric.name} ${metric.type}\n`);
        }
        if (Object.prototype.hasOwnProperty.call(metric, 'value')) {
            const v = metric.value === undefined ? NaN : metric.value;
            ret.push(`${metric.name}${formatLabels(metric.labels)} ${v}\n`);
        }
    }
    return ret.join('');
}
