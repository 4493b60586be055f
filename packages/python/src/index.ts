export {
  GET_PIP_URL,
  moduleExists,
  moduleNameFor,
  installPythonPackage,
} from './pip.js'

export {
  type InstallBuildAgentOptions,
  SERVICE_ACCOUNT,
  SERVICE_HOME,
  DEFAULT_ACCOUNT,
  DEFAULT_COORDINATOR,
  AGENT_PASSWORD,
  TWISTED_SPEC,
  installBuildAgent,
} from './buildbot.js'
