import type { Logger } from "pino";
import type { BootstrapTokenIssuer } from "../bootstrap-token.js";
import { createMachineError, errorMessage, invalidMachineConfiguration } from "../errors.js";
import type { OpenstackProviderSpec } from "../machine/provider-spec.js";
import { MACHINE_ROLE_LABEL, type Machine } from "../machine/types.js";
import type { SecretStore } from "../store/types.js";
import { PostprocessorError, resolvePostprocessor, type Postprocessor } from "./postprocess.js";
import { TemplateRenderError, assertTemplateVariables, machineRoleFromLabel, renderStartupScript } from "./template.js";

export const USER_DATA_KEY = "userData";
export const DISABLE_TEMPLATING_KEY = "disableTemplating";
export const POSTPROCESSOR_KEY = "postprocessor";

type UserDataSource = {
  userData: string;
  disableTemplating: boolean;
  postprocessor: string | null;
};

async function loadUserDataSource(params: {
  machine: Machine;
  spec: OpenstackProviderSpec;
  secrets: SecretStore;
}): Promise<UserDataSource> {
  const ref = params.spec.userDataSecret;
  if (!ref) return { userData: "", disableTemplating: false, postprocessor: null };

  const namespace = ref.namespace || params.machine.metadata.namespace;
  if (!ref.name) throw invalidMachineConfiguration("UserDataSecret name must be provided");

  const secret = await params.secrets.getSecret(namespace, ref.name);
  if (!secret) throw new Error(`user data secret ${namespace}/${ref.name} not found`);

  const userData = secret.data[USER_DATA_KEY];
  if (userData === undefined) {
    throw invalidMachineConfiguration(
      `Machine's userdata secret ${ref.name} in namespace ${namespace} did not contain key ${USER_DATA_KEY}`,
    );
  }

  return {
    userData,
    disableTemplating: DISABLE_TEMPLATING_KEY in secret.data,
    postprocessor: secret.data[POSTPROCESSOR_KEY] ?? null,
  };
}

function classifyRenderError(err: unknown): unknown {
  if (err instanceof TemplateRenderError) return createMachineError(`error creating Openstack instance: ${err.message}`);
  return err;
}

/**
 * Produces the final provisioning payload for a machine: secret lookup, role-specific
 * templating (joining nodes get a fresh bootstrap token first), then the optional
 * postprocessor. Classified failures surface as MachineErrors.
 */
export async function resolveUserData(params: {
  machine: Machine;
  spec: OpenstackProviderSpec;
  clusterName: string;
  secrets: SecretStore;
  issuer: BootstrapTokenIssuer;
  logger: Logger;
}): Promise<string> {
  const source = await loadUserDataSource(params);

  let postprocessor: Postprocessor | null = null;
  if (source.postprocessor !== null) {
    try {
      postprocessor = resolvePostprocessor(source.postprocessor);
    } catch (err) {
      if (err instanceof PostprocessorError) throw invalidMachineConfiguration(err.message);
      throw err;
    }
  }

  let rendered = source.userData;
  if (source.userData.length > 0 && !source.disableTemplating) {
    const role = machineRoleFromLabel(params.machine.metadata.labels[MACHINE_ROLE_LABEL]);
    try {
      // Checked before a token secret is minted for it.
      assertTemplateVariables(source.userData, role);
    } catch (err) {
      throw classifyRenderError(err);
    }

    let token: string | undefined;
    if (role === "worker") {
      params.logger.info({ machine: params.machine.metadata.name }, "creating bootstrap token");
      try {
        token = await params.issuer.issue();
      } catch (err) {
        throw createMachineError(`error creating Openstack instance: ${errorMessage(err)}`);
      }
    }
    try {
      rendered = renderStartupScript({
        template: source.userData,
        machine: params.machine,
        clusterName: params.clusterName,
        role,
        token,
      });
    } catch (err) {
      throw classifyRenderError(err);
    }
  }

  if (postprocessor !== null) {
    try {
      rendered = postprocessor.transform(rendered);
    } catch (err) {
      if (err instanceof PostprocessorError) throw invalidMachineConfiguration(err.message);
      throw createMachineError(`error creating Openstack instance: ${errorMessage(err)}`);
    }
  }

  return rendered;
}
