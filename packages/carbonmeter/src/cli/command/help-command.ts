export function printHelp() {
    console.log(`
Usage:
  report --files <a.csv,b.csv> --out <dir> [--date YYYY-MM-DD] [--config <file>] [-v|-vv]
  serve [--port 8080] [--host 127.0.0.1] [--samples <file.json>] [--config <file>] [-v|-vv]
  estimate --instance <class> --cpu <pct> [--storage <GB>] [--media ssd|hdd]
           [--duration <seconds>] [--region <region>] [--json]
  help

Commands:
  report                 Batch carbon report for VM usage exports (CSV in, CO2_<date>.csv out)
  serve                  HTTP query service (GET /status, POST /v1/carbon/query, GET /v1/carbon/hardware)
  estimate               Footprint of one VM class for a given CPU load

Options:
  --files <list>         Usage export files, comma separated or repeated
  --out <dir>            Output directory of the report
  --date <YYYY-MM-DD>    Execution date (default: EXECUTION_DATE, else today - 2 days)
  --config <file>        JSON config (default: ./carbonmeter.config.json when present)

  --port <port>          Listen port (default: 8080)
  --host <host>          Listen address (default: 127.0.0.1)
  --samples <file>       JSON array of telemetry records served by the query endpoint

  --instance <class>     Instance class, e.g. Standard_D4s_v3
  --cpu <pct>            Average CPU utilization, 0-100
  --storage <GB>         Attached storage (default: 0)
  --media <ssd|hdd>      Storage media (default: unknown)
  --duration <seconds>   Observation length (default: 3600)
  --region <region>      Grid region (default: germanywestcentral)
  --json                 Print JSON output (machine-readable)

  -v / --verbose         Debug logs
  -vv                    Trace logs
`);
}
