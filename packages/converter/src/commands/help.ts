/**
 * Help Command
 *
 * Displays CLI usage information.
 */

import { VERSION } from "../version.js";

export function help(): void {
  console.log(`
vidshift ${VERSION}

Convert video files between codecs with ffmpeg, using the GPU encoder when
one is available.

USAGE:
  vidshift <COMMAND> [OPTIONS]

COMMANDS:
  convert <file>       Convert a single file
  batch <directory>    Convert every video file under a directory
  info                 Show tools, detected hardware and encoders
  help, --help, -h     Show this help message
  version, --version   Show version information

OPTIONS:
  -c, --codec CODEC    Target codec: hevc, h264, av1, vp9 (default: hevc)
  -q, --quality N      Quality value (CRF/CQ/QP), lower is better
  -o, --output PATH    Output file (convert) or directory (batch)
  --input-codec CODEC  Batch only: convert files in this codec only
  --no-hdr             Do not carry HDR metadata through
  --cpu                Use software encoding even when a GPU is available
  --dry-run            Show what would run without converting
  -y, --overwrite      Replace an existing output file (convert)
  -v, --verbose        Debug logging

ENVIRONMENT VARIABLES:
  VIDSHIFT_FFMPEG_PATH      ffmpeg executable (default: ffmpeg)
  VIDSHIFT_FFPROBE_PATH     ffprobe executable (default: ffprobe)
  VIDSHIFT_PREFER_GPU       Use GPU encoders when available (default: true)
  VIDSHIFT_DETECT_TIMEOUT   Encoder detection timeout in ms (default: 10000)
  VIDSHIFT_PROBE_TIMEOUT    ffprobe timeout in ms (default: 30000)
  VIDSHIFT_HANG_TIMEOUT     Silence before ffmpeg is killed, in ms (default: 30000)
  VIDSHIFT_OUTPUT_SUFFIX    Output name suffix (default: _<codec>)
  VIDSHIFT_LOG_LEVEL        Log level (debug/info/warn/error, default: info)

EXAMPLES:
  vidshift convert movie.mkv                    # movie_hevc.mkv
  vidshift convert movie.mkv -c av1 -q 28       # movie_av1.mkv
  vidshift batch ~/Videos --input-codec av1 -o ~/Converted
  vidshift batch ~/Videos --dry-run
`);
}
