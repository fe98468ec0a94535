import {
  BackupClient,
  paginateListBackupPlans,
  paginateListBackupVaults,
  paginateListReportPlans,
  type AdvancedBackupSetting,
} from '@aws-sdk/client-backup';
import { ResourceCollector, type CollectorOptions } from '../collector.js';
import type { AuditIdentity } from '../identity.js';
import { logger, performanceTracker } from '../logging.js';
import {
  buildRegionalClients,
  type RegionalClient,
  type RegionalClientOptions,
  type RegionalClients,
} from '../regional-clients.js';
import type { Session } from '../session.js';

export interface BackupVault {
  readonly arn: string;
  readonly name: string;
  readonly region: string;
  /** KMS key ARN */
  readonly encryption?: string;
  readonly recoveryPoints: number;
  readonly locked: boolean;
  readonly minRetentionDays?: number;
  readonly maxRetentionDays?: number;
}

export interface BackupPlan {
  readonly arn: string;
  readonly id: string;
  readonly region: string;
  readonly name: string;
  readonly versionId?: string;
  readonly lastExecutionDate?: Date;
  readonly advancedSettings: readonly AdvancedBackupSetting[];
}

export interface BackupReportPlan {
  readonly arn: string;
  readonly region: string;
  readonly name: string;
  readonly lastAttemptedExecutionDate?: Date;
  readonly lastSuccessfulExecutionDate?: Date;
}

export class BackupCollector extends ResourceCollector<BackupClient> {
  readonly vaults: BackupVault[] = [];
  readonly plans: BackupPlan[] = [];
  readonly reportPlans: BackupReportPlan[] = [];

  constructor(regionalClients: RegionalClients<BackupClient>, options: CollectorOptions = {}) {
    super('backup', regionalClients, options);
  }

  static async create(
    session: Session,
    identity: AuditIdentity,
    options: RegionalClientOptions = {}
  ): Promise<BackupCollector> {
    const clients = buildRegionalClients('backup', session, identity, config => new BackupClient(config), options);
    const collector = new BackupCollector(clients, {
      auditResources: identity.resourceArns,
      profileRegion: identity.profileRegion,
    });
    return collector.collect();
  }

  async collect(): Promise<this> {
    this.vaults.push(...await this.fanOut('Listing Backup Vaults', (client, trackingId) => this.listBackupVaults(client, trackingId)));
    this.plans.push(...await this.fanOut('Listing Backup Plans', (client, trackingId) => this.listBackupPlans(client, trackingId)));
    this.reportPlans.push(...await this.fanOut('Listing Backup Report Plans', (client, trackingId) => this.listReportPlans(client, trackingId)));
    return this;
  }

  private async listBackupVaults({ client, region }: RegionalClient<BackupClient>, trackingId: string): Promise<BackupVault[]> {
    const vaults: BackupVault[] = [];
    for await (const page of paginateListBackupVaults({ client }, {})) {
      performanceTracker.recordAPICall(trackingId);
      for (const vault of page.BackupVaultList ?? []) {
        if (!vault.BackupVaultArn || !this.isIncluded(vault.BackupVaultArn)) continue;
        vaults.push(Object.freeze({
          arn: vault.BackupVaultArn,
          name: vault.BackupVaultName ?? '',
          region,
          encryption: vault.EncryptionKeyArn,
          recoveryPoints: vault.NumberOfRecoveryPoints ?? 0,
          locked: vault.Locked ?? false,
          minRetentionDays: vault.MinRetentionDays,
          maxRetentionDays: vault.MaxRetentionDays,
        }));
      }
    }
    return vaults;
  }

  private async listBackupPlans({ client, region }: RegionalClient<BackupClient>, trackingId: string): Promise<BackupPlan[]> {
    const plans: BackupPlan[] = [];
    for await (const page of paginateListBackupPlans({ client }, {})) {
      performanceTracker.recordAPICall(trackingId);
      for (const plan of page.BackupPlansList ?? []) {
        if (!plan.BackupPlanArn || !this.isIncluded(plan.BackupPlanArn)) continue;
        plans.push(Object.freeze({
          arn: plan.BackupPlanArn,
          id: plan.BackupPlanId ?? '',
          region,
          name: plan.BackupPlanName ?? '',
          versionId: plan.VersionId,
          lastExecutionDate: plan.LastExecutionDate,
          advancedSettings: Object.freeze([...(plan.AdvancedBackupSettings ?? [])]),
        }));
      }
    }
    return plans;
  }

  private async listReportPlans({ client, region }: RegionalClient<BackupClient>, trackingId: string): Promise<BackupReportPlan[]> {
    const reportPlans: BackupReportPlan[] = [];
    for await (const page of paginateListReportPlans({ client }, {})) {
      performanceTracker.recordAPICall(trackingId);
      for (const reportPlan of page.ReportPlans ?? []) {
        if (!reportPlan.ReportPlanArn || !this.isIncluded(reportPlan.ReportPlanArn)) continue;
        reportPlans.push(Object.freeze({
          arn: reportPlan.ReportPlanArn,
          region,
          name: reportPlan.ReportPlanName ?? '',
          lastAttemptedExecutionDate: reportPlan.LastAttemptedExecutionTime,
          lastSuccessfulExecutionDate: reportPlan.LastSuccessfulExecutionTime,
        }));
      }
    }
    logger.debug(`Backup report plans collected in ${region}`, { total: reportPlans.length }, this.service);
    return reportPlans;
  }
}
