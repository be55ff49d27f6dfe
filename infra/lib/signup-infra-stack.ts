import * as path from 'path';
import { CfnOutput, Duration, RemovalPolicy, Stack, StackProps } from 'aws-cdk-lib';
import { Construct } from 'constructs';
import * as dynamodb from 'aws-cdk-lib/aws-dynamodb';
import * as lambda from 'aws-cdk-lib/aws-lambda';
import * as lambdaNode from 'aws-cdk-lib/aws-lambda-nodejs';
import * as apigw from 'aws-cdk-lib/aws-apigateway';
import * as secrets from 'aws-cdk-lib/aws-secretsmanager';

export interface SignupInfraStackProps extends StackProps {
  /** ARN of the token authorizer function owned by the auth service. */
  authorizerArn: string;
}

export class SignupInfraStack extends Stack {
  constructor(scope: Construct, id: string, props: SignupInfraStackProps) {
    super(scope, id, props);

    const envName = this.node.tryGetContext('env') ?? 'prod';
    const isDev = envName === 'dev';
    const prefix = isDev ? 'dev-' : '';

    this.tags.setTag('application', 'tournament-signup');
    this.tags.setTag('environment', envName);

    const table = (logicalId: string, tableName: string, partitionKey: string, sortKey?: string) =>
      new dynamodb.Table(this, logicalId, {
        tableName: `${prefix}${tableName}`,
        partitionKey: { name: partitionKey, type: dynamodb.AttributeType.STRING },
        sortKey: sortKey ? { name: sortKey, type: dynamodb.AttributeType.STRING } : undefined,
        billingMode: dynamodb.BillingMode.PAY_PER_REQUEST,
        removalPolicy: isDev ? RemovalPolicy.DESTROY : RemovalPolicy.RETAIN
      });

    // Data stores
    const accountsTable = table('AccountsTable', 'SignupAccounts', 'accountId');
    const tournamentsTable = table('TournamentsTable', 'SignupTournaments', 'tournamentId');
    const eventsTable = table('EventsTable', 'SignupEvents', 'eventId');

    const membershipsTable = table('MembershipsTable', 'SignupMemberships', 'accountId', 'eventId');
    membershipsTable.addGlobalSecondaryIndex({
      indexName: 'members-by-event',
      partitionKey: { name: 'eventId', type: dynamodb.AttributeType.STRING },
      sortKey: { name: 'accountId', type: dynamodb.AttributeType.STRING },
      projectionType: dynamodb.ProjectionType.ALL
    });

    const signupsTable = table('SignupsTable', 'SignupEntries', 'tournamentId', 'signupKey');

    const approverRequestsTable = table('ApproverRequestsTable', 'SignupApproverRequests', 'tournamentId', 'requestKey');
    approverRequestsTable.addGlobalSecondaryIndex({
      indexName: 'requests-by-approver',
      partitionKey: { name: 'approverId', type: dynamodb.AttributeType.STRING },
      sortKey: { name: 'tournamentId', type: dynamodb.AttributeType.STRING },
      projectionType: dynamodb.ProjectionType.ALL
    });

    const responsesTable = table('ResponsesTable', 'SignupResponses', 'tournamentId', 'responseKey');
    const guardianLinksTable = table('GuardianLinksTable', 'SignupGuardianLinks', 'childId', 'guardianId');
    const performancesTable = table('PerformancesTable', 'SignupPerformances', 'accountId', 'tournamentId');

    const allTables = [
      accountsTable,
      tournamentsTable,
      eventsTable,
      membershipsTable,
      signupsTable,
      approverRequestsTable,
      responsesTable,
      guardianLinksTable,
      performancesTable
    ];

    const draftSecret = new secrets.Secret(this, 'DraftSigningSecret', {
      secretName: `${prefix}SIGNUP-DRAFT-SIGNING-SECRET`,
      generateSecretString: { passwordLength: 48, excludePunctuation: true }
    });

    const commonEnv = {
      ACCOUNTS_TABLE: accountsTable.tableName,
      TOURNAMENTS_TABLE: tournamentsTable.tableName,
      EVENTS_TABLE: eventsTable.tableName,
      MEMBERSHIPS_TABLE: membershipsTable.tableName,
      SIGNUPS_TABLE: signupsTable.tableName,
      APPROVER_REQUESTS_TABLE: approverRequestsTable.tableName,
      RESPONSES_TABLE: responsesTable.tableName,
      GUARDIAN_LINKS_TABLE: guardianLinksTable.tableName,
      PERFORMANCES_TABLE: performancesTable.tableName,
      DRAFT_SECRET_NAME: draftSecret.secretName,
      METRICS_NAMESPACE: 'SignupOps',
      SERVICE_NAME: 'signup-api',
      ENV_NAME: envName,
      AWS_NODEJS_CONNECTION_REUSE_ENABLED: '1'
    };

    const sharedNodeModules = [
      '@aws-sdk/client-dynamodb',
      '@aws-sdk/client-secrets-manager',
      '@aws-sdk/lib-dynamodb',
      'aws-embedded-metrics',
      'zod'
    ];

    const createLambda = (id: string, entryFile: string) => {
      const fn = new lambdaNode.NodejsFunction(this, id, {
        runtime: lambda.Runtime.NODEJS_20_X,
        handler: 'handler',
        entry: path.join(__dirname, '..', '..', 'services', 'src', 'lambdas', entryFile),
        functionName: `${prefix}${id}`,
        bundling: {
          target: 'node20',
          format: lambdaNode.OutputFormat.CJS,
          minify: false,
          externalModules: [],
          nodeModules: sharedNodeModules
        },
        timeout: Duration.seconds(20),
        environment: commonEnv
      });

      for (const t of allTables) {
        t.grantReadWriteData(fn);
      }
      draftSecret.grantRead(fn);

      return fn;
    };

    const requirementsFn = createLambda('SignupRequirementsApiFn', 'signupRequirementsApi.ts');
    const workflowFn = createLambda('SignupWorkflowApiFn', 'signupWorkflowApi.ts');
    const partnerSearchFn = createLambda('PartnerSearchApiFn', 'partnerSearchApi.ts');
    const approverFn = createLambda('ApproverApiFn', 'approverApi.ts');
    const approverRequestsFn = createLambda('ApproverRequestsApiFn', 'approverRequestsApi.ts');
    const resultsFn = createLambda('ResultsApiFn', 'resultsApi.ts');

    // API Gateway (REST)
    const api = new apigw.RestApi(this, 'SignupApi', {
      restApiName: `${prefix}Tournament Signup API`,
      deployOptions: {
        stageName: envName
      },
      defaultCorsPreflightOptions: {
        allowOrigins: apigw.Cors.ALL_ORIGINS,
        allowMethods: apigw.Cors.ALL_METHODS,
        allowHeaders: ['Content-Type', 'Authorization', 'X-Requested-With']
      },
      defaultMethodOptions: {
        authorizationType: apigw.AuthorizationType.CUSTOM
      }
    });

    const authorizerFn = lambda.Function.fromFunctionArn(this, 'ImportedAuthorizerFn', props.authorizerArn);
    const authorizer = new apigw.TokenAuthorizer(this, 'ApiAuthorizer', {
      handler: authorizerFn,
      resultsCacheTtl: Duration.seconds(0)
    });

    const tournamentIdResource = api.root.addResource('tournaments').addResource('{id}');

    const signupResource = tournamentIdResource.addResource('signup');
    signupResource
      .addResource('requirements')
      .addMethod('GET', new apigw.LambdaIntegration(requirementsFn), { authorizer });
    for (const step of ['validate', 'review', 'final-warning', 'submit']) {
      signupResource.addResource(step).addMethod('POST', new apigw.LambdaIntegration(workflowFn), { authorizer });
    }

    const approverResource = tournamentIdResource.addResource('approver');
    approverResource.addMethod('GET', new apigw.LambdaIntegration(approverFn), { authorizer });
    approverResource.addMethod('PUT', new apigw.LambdaIntegration(approverFn), { authorizer });

    tournamentIdResource
      .addResource('results')
      .addMethod('POST', new apigw.LambdaIntegration(resultsFn), { authorizer });

    api.root
      .addResource('events')
      .addResource('{eventId}')
      .addResource('partners')
      .addMethod('GET', new apigw.LambdaIntegration(partnerSearchFn), { authorizer });

    const approverRequestsResource = api.root.addResource('approver-requests');
    approverRequestsResource.addMethod('GET', new apigw.LambdaIntegration(approverRequestsFn), { authorizer });
    approverRequestsResource.addMethod('PUT', new apigw.LambdaIntegration(approverRequestsFn), { authorizer });

    new CfnOutput(this, 'SignupApiUrl', {
      value: api.url,
      description: 'Base URL of the signup REST API'
    });
  }
}
