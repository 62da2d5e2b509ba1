// Target interpreter
export const DEFAULT_PYTHON_VERSION = '3.10'

// Paths relative to the bootstrap root
export const DEFAULT_ENVIRONMENT_DIR = 'venv'
export const DEFAULT_MANIFEST_PATH = 'requirements/requirements.txt'
export const DEFAULT_FALLBACK_MANIFEST_PATH = 'requirement.txt'
export const DEFAULT_ENTRY_POINT = 'app/main.py'
export const DEFAULT_INSTALL_LOG_PATH = 'logs/install.log'

// Upgraded before the manifest install
export const DEFAULT_PACKAGING_TOOLS = ['pip', 'setuptools', 'wheel'] as const

// Tool-cache name used by setup-python style installers
export const PYTHON_TOOL_CACHE_NAME = 'Python'

// Trailing output kept in diagnostics
export const OUTPUT_TAIL_LENGTH = 1000
