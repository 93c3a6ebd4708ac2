/**
 * datastream-export
 *
 * Export Datastream time series or instrument metadata to xlsx/json.
 *
 * Usage:
 *   DATASTREAM_USERNAME=... DATASTREAM_PASSWORD=... \
 *     datastream-export timeseries --instruments VOD,BARC --datatypes P,PH --out prices.xlsx
 */

import { run } from './cli';

run(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    console.error(err);
    process.exit(1);
  });
