#!/usr/bin/env node
import * as cdk from 'aws-cdk-lib';
import { SignupInfraStack } from '../lib/signup-infra-stack';

const app = new cdk.App();

const authorizerArn = app.node.tryGetContext('authorizerArn');
if (typeof authorizerArn !== 'string' || authorizerArn.length === 0) {
  throw new Error('Pass the token authorizer ARN with -c authorizerArn=<arn>');
}

new SignupInfraStack(app, 'SignupInfraStack', {
  authorizerArn,
  env: {
    region: 'us-east-1'
  }
});
